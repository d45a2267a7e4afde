// packages/protocol/src/index.ts
//
// Shared protocol definitions for the solver HTTP API.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - ConstraintSet: the wire form of accumulated feedback.
//   - Request/response shapes for stateless feedback and for sessions.
//
// Schemas check structure only. Token contents (lengths, letters,
// contradictions) are validated by the solver, which reports them as
// structured errors.

import { z } from 'zod';

const letter = z.string().regex(/^[a-z]$/);

/**
 * Constraint set as sent by clients of the stateless endpoint:
 *  - fixed:             one entry per position, letter or null
 *  - excludedPositions: letter → 1-based positions (yellow), within `fixed`
 *  - excludedLetters:   grey letters
 *
 * Consistency between the three (a letter both fixed and grey, the word
 * length) is checked by the solver and answered with 409 / 422.
 */
export const constraintSetSchema = z
  .object({
    fixed: z.array(letter.nullable()).min(1),
    excludedPositions: z.record(letter, z.array(z.number().int().min(1))),
    excludedLetters: z.array(letter),
  })
  .superRefine((cs, ctx) => {
    for (const [l, positions] of Object.entries(cs.excludedPositions)) {
      for (const pos of positions) {
        if (pos <= cs.fixed.length) continue;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['excludedPositions', l],
          message: `Position ${pos} is past the last position (${cs.fixed.length})`,
        });
      }
    }
  });
export type ConstraintSetWire = z.infer<typeof constraintSetSchema>;

/* -------------------------------------------------------------------------- */
/*                               Round feedback                               */
/* -------------------------------------------------------------------------- */

/**
 * One round of feedback.
 *  - guess:   the played word
 *  - greens:  letters + dots, e.g. "S..NT"
 *  - yellows: letters + dots, e.g. ".A..."; optional, defaults to none
 *  - greys:   array of letters or a space-separated string; optional
 */
export const roundFeedback = z.object({
  guess: z.string(),
  greens: z.string(),
  yellows: z.string().default(''),
  greys: z.union([z.array(z.string()), z.string()]).default([]),
});
export type RoundFeedback = z.infer<typeof roundFeedback>;

/** POST /api/feedback: stateless, the client carries the constraint set. */
export const feedbackReq = roundFeedback.extend({
  constraints: constraintSetSchema.optional(),
});

export const suggestionSchema = z.object({
  word: z.string(),
  score: z.number().int(),
});

/**
 * Response to a feedback round:
 *  - constraints:    the updated constraint set (send it back next round)
 *  - unique/repeated: candidate buckets, corpus order
 *  - recommendation: next guess, or null when nothing fits
 *  - expanded:       true when candidates came from the expansion search
 *  - solved:         this round's greens named every letter (the answer was
 *                    played); pinning every position over several rounds
 *                    leaves it false
 */
export const feedbackRes = z.object({
  constraints: constraintSetSchema,
  solved: z.boolean(),
  expanded: z.boolean(),
  count: z.number().int().min(0),
  unique: z.array(z.string()),
  repeated: z.array(z.string()),
  recommendation: z.string().nullable(),
  suggestions: z.array(suggestionSchema),
});
export type FeedbackRes = z.infer<typeof feedbackRes>;

/* -------------------------------------------------------------------------- */
/*                                  Sessions                                  */
/* -------------------------------------------------------------------------- */

/** POST /api/sessions */
export const newSessionReq = z.object({
  firstGuess: z.string().regex(/^[A-Za-z]+$/).optional(),
});

export const newSessionRes = z.object({
  sessionId: z.string(),
  firstGuess: z.string(),
});

/** POST /api/sessions/:id/feedback; `round` counts accepted rounds. */
export const sessionFeedbackRes = feedbackRes.extend({
  round: z.number().int().min(1),
});

/** GET /api/sessions/:id */
export const sessionRes = z.object({
  sessionId: z.string(),
  round: z.number().int().min(0),
  constraints: constraintSetSchema,
});

/* -------------------------------------------------------------------------- */
/*                                   Errors                                   */
/* -------------------------------------------------------------------------- */

export const errorKind = z.enum(['input_format', 'contradiction', 'not_found']);

export const errorRes = z.object({
  error: z.object({
    kind: errorKind,
    message: z.string(),
  }),
});
export type ErrorRes = z.infer<typeof errorRes>;

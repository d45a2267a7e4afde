// apps/server/src/app.ts
//
// Express application for the solver API.
//
// Responsibilities:
//   • Stateless feedback: the client sends its constraint set with each round.
//   • Sessions: the constraint set lives in memory, keyed by a nanoid.
//   • Map solver errors to HTTP statuses (422 format, 409 contradiction).
//
// The solver context is loaded once by the caller and shared read-only by
// every request and session. Sessions are not persisted; a restart drops them.

import express, { type Response } from 'express';
import cors from 'cors';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import {
  ContradictionError,
  createConfig,
  emptyConstraints,
  freezeConstraints,
  InputFormatError,
  solveRound,
  type ConstraintSet,
  type FeedbackError,
  type FeedbackInput,
  type RoundAnalysis,
  type SolverContext,
} from '@letterwise/solver-core';
import {
  errorRes,
  feedbackReq,
  feedbackRes,
  newSessionReq,
  newSessionRes,
  roundFeedback,
  sessionFeedbackRes,
  sessionRes,
  type RoundFeedback,
} from '@letterwise/protocol';

/* -------------------------------------------------------------------------- */
/*                              In-memory state                               */
/* -------------------------------------------------------------------------- */
type Session = {
  id: string;
  /** Accepted rounds so far. */
  round: number;
  constraints: ConstraintSet;
  /** Shared context with this session's config applied. */
  ctx: SolverContext;
};

/* -------------------------------------------------------------------------- */
/*                                  Helpers                                   */
/* -------------------------------------------------------------------------- */
function toFeedbackInput(body: RoundFeedback): FeedbackInput {
  return { guess: body.guess, green: body.greens, yellow: body.yellows, grey: body.greys };
}

function analysisBody(a: RoundAnalysis) {
  return {
    constraints: a.constraints,
    solved: a.solved,
    expanded: a.expanded,
    count: a.result.count,
    unique: a.result.unique,
    repeated: a.result.repeated,
    recommendation: a.recommendation,
    suggestions: a.suggestions,
  };
}

function sendError(res: Response, err: FeedbackError) {
  const status = err instanceof ContradictionError ? 409 : 422;
  return res.status(status).json(errorRes.parse({ error: { kind: err.kind, message: err.message } }));
}

function sendNotFound(res: Response, id: string) {
  return res
    .status(404)
    .json(errorRes.parse({ error: { kind: 'not_found', message: `Session ${id} not found` } }));
}

/* -------------------------------------------------------------------------- */
/*                                    App                                     */
/* -------------------------------------------------------------------------- */
export function createApp(ctx: SolverContext, log: Logger) {
  const sessions = new Map<string, Session>();
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/api/feedback', (req, res) => {
    const parsed = feedbackReq.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    // A client-supplied set is validated by solveRound before it is merged.
    const constraints = parsed.data.constraints
      ? freezeConstraints(parsed.data.constraints)
      : emptyConstraints(ctx.config.wordLength);
    const outcome = solveRound(ctx, constraints, toFeedbackInput(parsed.data));
    if (!outcome.ok) {
      log.debug({ kind: outcome.error.kind, guess: parsed.data.guess }, 'feedback rejected');
      return sendError(res, outcome.error);
    }

    log.debug({ count: outcome.result.count, expanded: outcome.expanded }, 'feedback applied');
    res.json(feedbackRes.parse(analysisBody(outcome)));
  });

  app.post('/api/sessions', (req, res) => {
    const parsed = newSessionReq.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    let config = ctx.config;
    if (parsed.data.firstGuess) {
      try {
        config = createConfig({ wordLength: ctx.config.wordLength, firstGuess: parsed.data.firstGuess });
      } catch (err) {
        return sendError(res, new InputFormatError(err instanceof Error ? err.message : String(err)));
      }
    }

    const id = nanoid();
    sessions.set(id, { id, round: 0, constraints: emptyConstraints(config.wordLength), ctx: { ...ctx, config } });
    log.info({ sessionId: id, sessions: sessions.size }, 'session created');
    res.status(201).json(newSessionRes.parse({ sessionId: id, firstGuess: config.firstGuess }));
  });

  app.get('/api/sessions/:id', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) return sendNotFound(res, req.params.id);
    res.json(
      sessionRes.parse({ sessionId: session.id, round: session.round, constraints: session.constraints }),
    );
  });

  app.post('/api/sessions/:id/feedback', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) return sendNotFound(res, req.params.id);

    const parsed = roundFeedback.safeParse(req.body);
    if (!parsed.success) return res.status(400).json(parsed.error.format());

    const outcome = solveRound(session.ctx, session.constraints, toFeedbackInput(parsed.data));
    if (!outcome.ok) {
      log.debug({ sessionId: session.id, kind: outcome.error.kind }, 'session feedback rejected');
      return sendError(res, outcome.error);
    }

    session.constraints = outcome.constraints;
    session.round += 1;
    log.debug({ sessionId: session.id, round: session.round, count: outcome.result.count }, 'session round');
    res.json(sessionFeedbackRes.parse({ ...analysisBody(outcome), round: session.round }));
  });

  app.delete('/api/sessions/:id', (req, res) => {
    if (!sessions.delete(req.params.id)) return sendNotFound(res, req.params.id);
    log.info({ sessionId: req.params.id }, 'session deleted');
    res.status(204).end();
  });

  return app;
}

// apps/server/src/__tests__/app.test.ts
//
// HTTP tests for the solver API. The app listens on an ephemeral port in
// this process and is driven with fetch; the solver context is built from
// an in-memory corpus.

import type { Server } from 'node:http';
import { pino } from 'pino';

import {
  createConfig,
  createCorpus,
  createFrequencyTable,
  type SolverContext,
} from '@letterwise/solver-core';
import { errorRes, feedbackRes, newSessionRes, sessionFeedbackRes, sessionRes } from '@letterwise/protocol';

import { createApp } from '../app.js';

const ctx: SolverContext = {
  corpus: createCorpus(['saint', 'slant', 'plant', 'chant', 'grant'], 5),
  frequencies: createFrequencyTable([], 5),
  config: createConfig(),
};

let server: Server;
let base: string;

beforeAll(async () => {
  const app = createApp(ctx, pino({ level: 'silent' }));
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no TCP address');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: unknown) {
  return fetch(`${base}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const firstRound = { guess: 'SAINT', greens: '.....', yellows: '.A...', greys: 'E R' };

describe('GET /health', () => {
  it('reports ok', async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });
});

describe('POST /api/feedback', () => {
  it('filters from an empty constraint set', async () => {
    const res = await post('/api/feedback', firstRound);
    expect(res.status).toBe(200);
    const body = feedbackRes.parse(await res.json());
    expect(body.unique).toEqual(['slant', 'plant', 'chant']);
    expect(body.repeated).toEqual([]);
    expect(body.count).toBe(3);
    expect(body.recommendation).toBe('slant');
    expect(body.solved).toBe(false);
    expect(body.constraints).toEqual({
      fixed: [null, null, null, null, null],
      excludedPositions: { a: [2] },
      excludedLetters: ['e', 'r'],
    });
    expect(body.suggestions).toEqual([
      { word: 'chant', score: 5000 },
      { word: 'plant', score: 5000 },
      { word: 'slant', score: 5000 },
    ]);
  });

  it('continues from the constraint set the client sends back', async () => {
    const first = feedbackRes.parse(await (await post('/api/feedback', firstRound)).json());
    const res = await post('/api/feedback', { constraints: first.constraints, guess: 'plant', greens: 'PLANT' });
    const body = feedbackRes.parse(await res.json());
    expect(body.solved).toBe(true);
    expect(body.unique).toEqual(['plant']);
    expect(body.suggestions).toEqual([{ word: 'plant', score: 0 }]);
    expect(body.constraints.fixed).toEqual(['p', 'l', 'a', 'n', 't']);
  });

  it('answers 409 when the sent constraint set fixes a letter it also lists as absent', async () => {
    const res = await post('/api/feedback', {
      constraints: { fixed: ['p', null, null, null, null], excludedPositions: {}, excludedLetters: ['p'] },
      guess: 'slant',
      greens: '.....',
    });
    expect(res.status).toBe(409);
    expect(errorRes.parse(await res.json()).error).toEqual({
      kind: 'contradiction',
      message: "'p' is fixed at position 1 but listed as absent",
    });
  });

  it('answers 409 when a letter is excluded at its own fixed position', async () => {
    const res = await post('/api/feedback', {
      constraints: { fixed: ['p', null, null, null, null], excludedPositions: { p: [1] }, excludedLetters: [] },
      guess: 'slant',
      greens: '.....',
    });
    expect(res.status).toBe(409);
    expect(errorRes.parse(await res.json()).error.message).toBe("'p' is fixed at position 1 but excluded there");
  });

  it('answers 422 for a constraint set of the wrong length', async () => {
    const res = await post('/api/feedback', {
      constraints: { fixed: [null, null, null, null], excludedPositions: {}, excludedLetters: [] },
      guess: 'slant',
      greens: '.....',
    });
    expect(res.status).toBe(422);
    expect(errorRes.parse(await res.json()).error).toEqual({
      kind: 'input_format',
      message: 'Constraint set covers 4 positions, expected 5',
    });
  });

  it('answers 400 for an excluded position past the end of the word', async () => {
    const res = await post('/api/feedback', {
      constraints: { fixed: [null, null, null, null, null], excludedPositions: { z: [9] }, excludedLetters: [] },
      guess: 'slant',
      greens: '.....',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty('constraints');
  });

  it('answers 400 for a malformed body', async () => {
    const res = await post('/api/feedback', { greens: '.....' });
    expect(res.status).toBe(400);
    expect(await res.json()).toHaveProperty('guess');
  });

  it('answers 422 for a format error', async () => {
    const res = await post('/api/feedback', { guess: 'abc', greens: '.....' });
    expect(res.status).toBe(422);
    expect(errorRes.parse(await res.json())).toEqual({
      error: { kind: 'input_format', message: 'Guess must be exactly 5 letters (got 3)' },
    });
  });

  it('answers 409 for contradictory feedback', async () => {
    const res = await post('/api/feedback', { guess: 'saint', greens: 'p....' });
    expect(res.status).toBe(409);
    expect(errorRes.parse(await res.json()).error).toEqual({
      kind: 'contradiction',
      message: "Green 'p' at position 1 does not match guess letter 's'",
    });
  });
});

describe('sessions', () => {
  it('keeps the constraint set between rounds', async () => {
    const created = await post('/api/sessions', {});
    expect(created.status).toBe(201);
    const { sessionId, firstGuess } = newSessionRes.parse(await created.json());
    expect(firstGuess).toBe('saint');

    const r1 = sessionFeedbackRes.parse(await (await post(`/api/sessions/${sessionId}/feedback`, firstRound)).json());
    expect(r1.round).toBe(1);
    expect(r1.unique).toEqual(['slant', 'plant', 'chant']);

    const state = sessionRes.parse(await (await fetch(`${base}/api/sessions/${sessionId}`)).json());
    expect(state).toEqual({ sessionId, round: 1, constraints: r1.constraints });

    const r2 = sessionFeedbackRes.parse(
      await (await post(`/api/sessions/${sessionId}/feedback`, { guess: 'slant', greens: '..ant', greys: 's l' })).json(),
    );
    expect(r2.round).toBe(2);
    expect(r2.unique).toEqual(['chant']);
    expect(r2.recommendation).toBe('chant');
  });

  it('reports solved only once the answer itself is played', async () => {
    const { sessionId } = newSessionRes.parse(await (await post('/api/sessions', {})).json());
    const send = async (body: unknown) =>
      sessionFeedbackRes.parse(await (await post(`/api/sessions/${sessionId}/feedback`, body)).json());

    await send({ guess: 'paint', greens: 'p..nt', yellows: '.a...', greys: 'i' });
    const pinned = await send({ guess: 'slant', greens: '.lant', greys: 's' });
    expect(pinned.constraints.fixed).toEqual(['p', 'l', 'a', 'n', 't']);
    expect(pinned.solved).toBe(false);
    expect(pinned.recommendation).toBe('plant');

    const played = await send({ guess: 'plant', greens: 'PLANT' });
    expect(played.solved).toBe(true);
    expect(played.round).toBe(3);
  });

  it('leaves the session untouched when a round is rejected', async () => {
    const { sessionId } = newSessionRes.parse(await (await post('/api/sessions', {})).json());
    await post(`/api/sessions/${sessionId}/feedback`, firstRound);

    const res = await post(`/api/sessions/${sessionId}/feedback`, { guess: 'crepe', greens: '..e..' });
    expect(res.status).toBe(409);
    expect(errorRes.parse(await res.json()).error.message).toBe(
      "'e' was reported absent earlier but is green at position 3",
    );

    const state = sessionRes.parse(await (await fetch(`${base}/api/sessions/${sessionId}`)).json());
    expect(state.round).toBe(1);
    expect(state.constraints.excludedLetters).toEqual(['e', 'r']);
  });

  it('accepts a custom first guess and rejects one of the wrong length', async () => {
    const ok = newSessionRes.parse(await (await post('/api/sessions', { firstGuess: 'CRANE' })).json());
    expect(ok.firstGuess).toBe('crane');

    const bad = await post('/api/sessions', { firstGuess: 'cran' });
    expect(bad.status).toBe(422);
    expect(errorRes.parse(await bad.json()).error.message).toBe("First guess must be 5 letters a–z (got 'cran')");
  });

  it('deletes sessions and reports unknown ones', async () => {
    const { sessionId } = newSessionRes.parse(await (await post('/api/sessions', {})).json());
    expect((await fetch(`${base}/api/sessions/${sessionId}`, { method: 'DELETE' })).status).toBe(204);

    const gone = await fetch(`${base}/api/sessions/${sessionId}`);
    expect(gone.status).toBe(404);
    expect(errorRes.parse(await gone.json()).error.kind).toBe('not_found');
    expect((await post(`/api/sessions/${sessionId}/feedback`, firstRound)).status).toBe(404);
  });
});

import { defineWorkspace } from 'vitest/config';

// One project per workspace; each brings its own vitest.config.ts.
export default defineWorkspace(['packages/*', 'apps/*']);

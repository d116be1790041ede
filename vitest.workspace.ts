import { defineWorkspace } from 'vitest/config';

// Each package carries its own vitest.config.ts.
export default defineWorkspace(['packages/*']);

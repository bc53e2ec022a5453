import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['typescript-client', 'respwire-cli-ts']);

// Testing utilities for @respwire/client
// Not part of the main entry point: import from '@respwire/client/testing'

export { FakeServer } from './FakeServer';
export type { FakeServerMode } from './FakeServer';
export { MockTransport } from '../transport/mockTransport';

/**
 * @chronokv/mock-server: in-process stand-in server for tests.
 */

export { MockServer, createMockServer, type MockServerOptions, type MockServerResult } from './server.js';
export { RevisionStore, describeRevision, sameValue, type Action, type Revision, type Snapshot, type Write } from './store.js';
export { parseCriteria, findRecords, matches, type Criteria, type Operator, type Operand } from './criteria.js';
export { resolvePhrase } from './phrases.js';
export { createClock, type Clock } from './clock.js';

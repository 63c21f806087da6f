export { createTestContext, testSettings } from './testApp';
export type { TestContext } from './testApp';
export { InMemoryLedger } from './inMemoryLedger';
export { FakeFundingClient } from './fakeFunding';

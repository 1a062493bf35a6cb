/**
 * Public test utilities, exported from the `"termbridge/testing"` entry point.
 * Consumers can drive a ProcessSupervisor without spawning real programs.
 */
export { FakeChannelFactory, FakeOutputChannel } from "./testing/fake-output-channel.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";

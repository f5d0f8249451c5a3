export { assert, describe, test } from "./nodeTest.js";
export {
  type FakeDrawOp,
  type FakeFrame,
  FakeRasterizer,
  type FakeRasterizerOptions,
  createFakeRasterizer,
} from "./fakeRasterizer.js";
export { StubModule, type StubModuleOptions, createStubModule } from "./stubModule.js";
export { type CapturedLog, type CapturingLogger, createCapturingLogger, silentLogger } from "./logger.js";

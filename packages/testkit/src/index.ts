export { assert, describe, test } from "./nodeTest.js";
export { createSpy, type Spy } from "./spy.js";

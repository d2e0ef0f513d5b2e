export { fixedClock, manualClock, type ManualClock } from "./clock.js";
export { createDeferred, type Deferred } from "./deferred.js";
export {
  createFetchJsonFixture,
  type FetchJsonFixture,
  type FetchJsonResponseFixture
} from "./http.js";

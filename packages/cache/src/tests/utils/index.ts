export { FakeRedisBytesClient } from "./fake-redis-bytes-client"
export { ManualTestClock } from "./manual-test-clock"

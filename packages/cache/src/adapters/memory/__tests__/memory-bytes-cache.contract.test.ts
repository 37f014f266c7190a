import { describeBytesCacheContract } from "../../../ports/__tests__/bytes-cache.contract"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { MemoryBytesCache } from "../memory-bytes-cache"

describeBytesCacheContract({
  name: "MemoryBytesCache",
  make: () => {
    const clock = new ManualTestClock()

    return {
      cache: new MemoryBytesCache({ clock }, { maxEntries: 100 }),
      advance: (ms) => clock.advance(ms),
    }
  },
})

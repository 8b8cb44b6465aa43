import { describeCoderContract } from "../../../ports/__tests__/coder.contract"
import { BigEndianIntegerCoder } from "../big-endian-integer-coder"

describeCoderContract({
  name: "BigEndianIntegerCoder",
  make: () => BigEndianIntegerCoder.of(),
  values: () => [0, 1, -1, 42, 256, 2147483647, -2147483648],
})

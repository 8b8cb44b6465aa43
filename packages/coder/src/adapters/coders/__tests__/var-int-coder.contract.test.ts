import { describeCoderContract } from "../../../ports/__tests__/coder.contract"
import { VarIntCoder } from "../var-int-coder"

describeCoderContract({
  name: "VarIntCoder",
  make: () => VarIntCoder.of(),
  values: () => [0, 1, 127, 128, 300, -1, 2147483647, -2147483648],
})

import { describeCoderContract } from "../../../ports/__tests__/coder.contract"
import { StringUtf8Coder } from "../string-utf8-coder"

describeCoderContract({
  name: "StringUtf8Coder",
  make: () => StringUtf8Coder.of(),
  values: () => ["", "a", "hello world", "grüße", "日本語", "\u{1F600}", "\uFEFFbom"],
})

import { catchCodecError } from "../../../tests/utils/catch-codec-error"
import { deserialize, serialize } from "../../serialize"
import { uleb128 } from "../varint"

describe("uleb128 shape", () => {
  it("embeds a minimal varint", () => {
    expect(serialize(uleb128, 300)).toEqual(new Uint8Array([0xac, 0x02]))
    expect(deserialize(uleb128, new Uint8Array([0xac, 0x02]))).toBe(300)
  })

  it.each([-1, 2 ** 32, 0.5])("rejects %d", (value) => {
    expect(catchCodecError(() => serialize(uleb128, value)).code).toBe("invalid_value")
  })

  it("rejects a non-minimal varint", () => {
    expect(catchCodecError(() => deserialize(uleb128, new Uint8Array([0xff, 0x00]))).code).toBe(
      "non_canonical_length",
    )
  })
})

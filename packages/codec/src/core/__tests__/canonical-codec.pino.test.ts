import { Writable } from "node:stream"
import { PinoLogger } from "@bincanon/logger"
import { catchCodecError } from "../../tests/utils/catch-codec-error"
import { Struct } from "../../tests/utils/shapes"
import { createCodec } from "../canonical-codec"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("CanonicalCodec with PinoLogger", () => {
  it("writes trace entries bound to the shape", () => {
    const { lines, destination } = makeLineDestination()
    const codec = createCodec(Struct, {
      logger: new PinoLogger({ destination }, { level: "trace" }, { service: "ledger" }),
    })

    codec.encode({ x: 1, y: 2n })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: 10,
      msg: "Value encoded",
      service: "ledger",
      module: "codec",
      shape: "Struct",
      operation: "encode",
      byteLength: 9,
    })
  })

  it("writes failures with the serialized error", () => {
    const { lines, destination } = makeLineDestination()
    const codec = createCodec(Struct, {
      logger: new PinoLogger({ destination }, { level: "debug" }),
    })

    catchCodecError(() => codec.decode(new Uint8Array([1])))

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: 20,
      msg: "Failed to decode value",
      shape: "Struct",
      code: "unexpected_end_of_input",
      offset: 1,
      err: {
        type: "CodecError",
        message: "Unexpected end of input at offset 1: needed 8 byte(s), 0 left",
      },
    })
  })
})

import type { Shape } from "../../ports/shape"
import { descend } from "../depth"
import { CodecError } from "../errors/codec-error"

/**
 * An optional value: `00` when absent, `01` followed by the value otherwise.
 *
 * Absent is `null`, so an inner shape that has `null` among its own values
 * (`unit`, another option) is refused. A lazy inner shape is checked when the
 * option is first used, once its target exists.
 */
export function option<T>(inner: Shape<T>, name = `option<${inner.name}>`): Shape<T | null> {
  let checked = false
  const checkInner = (): void => {
    if (checked) return
    if (inner.nullable) {
      throw CodecError.invalidShape({
        shape: name,
        reason: `"${inner.name}" has null among its values, so absent and present would decode alike`,
      })
    }
    checked = true
  }

  if (inner.kind !== "lazy") checkInner()

  return {
    kind: "container",
    name,
    nullable: true,
    write(sink, value, depth) {
      checkInner()
      const next = descend(depth, sink.limits)

      if (value === null) {
        sink.writeU8(0)
        return
      }

      sink.writeU8(1)
      inner.write(sink, value, next)
    },
    read(source, depth) {
      checkInner()
      const next = descend(depth, source.limits, source.offset)
      const offset = source.offset
      const byte = source.readU8()

      if (byte === 0) return null
      if (byte === 1) return inner.read(source, next)
      throw CodecError.invalidOptionTag({ offset, byte })
    },
  }
}

import type { Infer, Shape } from "../../ports/shape"
import { descend } from "../depth"
import { CodecError } from "../errors/codec-error"
import { isRecord, isUnknownArray } from "./guards"
import { combinedWidth } from "./width"

export type Fields = Record<string, Shape<unknown>>

export type StructValue<F extends Fields> = { [K in keyof F]: Infer<F[K]> }

export type TupleValue<S extends readonly Shape<unknown>[]> = { -readonly [K in keyof S]: Infer<S[K]> }

const INDEX_LIKE = /^(0|[1-9]\d*)$/

/**
 * A product of named fields, encoded back to back in declaration order with
 * no framing. `struct({})` is a unit struct and encodes to zero bytes.
 */
export function struct<F extends Fields>(fields: F, name?: string): Shape<StructValue<F>> {
  const entries: [string, Shape<unknown>][] = Object.entries(fields)
  const shapeName = name ?? `struct{${entries.map(([key]) => key).join(",")}}`

  for (const [key] of entries) {
    if (INDEX_LIKE.test(key)) {
      throw CodecError.invalidShape({
        shape: shapeName,
        reason: `field name "${key}" is an array index and would not keep its declared position`,
      })
    }
  }

  return {
    kind: "product",
    name: shapeName,
    get width() {
      return combinedWidth(entries.map(([, field]) => field))
    },
    write(sink, value, depth) {
      const record: unknown = value
      if (!isRecord(record)) {
        throw CodecError.invalidValue({ shape: shapeName, reason: "expected an object", received: value })
      }

      const inner = descend(depth, sink.limits)
      for (const [key, field] of entries) {
        if (!(key in record)) {
          throw CodecError.invalidValue({ shape: shapeName, reason: `missing field "${key}"` })
        }

        field.write(sink, record[key], inner)
      }
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      const decoded: unknown = Object.fromEntries(entries.map(([key, field]) => [key, field.read(source, inner)]))

      return decoded as StructValue<F>
    },
  }
}

/** A positional product; the value is a JavaScript tuple. */
export function tuple<const S extends readonly Shape<unknown>[]>(
  elements: [...S],
  name?: string,
): Shape<TupleValue<S>> {
  const shapeName = name ?? `tuple(${elements.map((el) => el.name).join(",")})`

  return {
    kind: "product",
    name: shapeName,
    get width() {
      return combinedWidth(elements)
    },
    write(sink, value, depth) {
      const items: unknown = value
      if (!isUnknownArray(items) || items.length !== elements.length) {
        throw CodecError.invalidValue({
          shape: shapeName,
          reason: `expected an array of ${elements.length}`,
          received: value,
        })
      }

      const inner = descend(depth, sink.limits)
      elements.forEach((element, i) => element.write(sink, items[i], inner))
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      const decoded: unknown = elements.map((element) => element.read(source, inner))

      return decoded as TupleValue<S>
    },
  }
}

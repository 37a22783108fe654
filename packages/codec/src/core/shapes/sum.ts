import { MAX_U32 } from "../../ports/limits"
import type { Shape } from "../../ports/shape"
import { descend } from "../depth"
import { CodecError } from "../errors/codec-error"
import { readUleb128, writeUleb128 } from "../varint/uleb128"
import { isRecord } from "./guards"
import { unit } from "./scalars"

export type Variant<T> = {
  readonly tag: number
  readonly shape: Shape<T>
}

export type Variants = Record<string, Variant<unknown>>

export type EnumValue<V extends Variants> = {
  [K in keyof V & string]: {
    kind: K
    value: V[K] extends Variant<infer T> ? T : never
  }
}[keyof V & string]

export function variant(tag: number): Variant<null>
export function variant<T>(tag: number, shape: Shape<T>): Variant<T>
export function variant(tag: number, shape: Shape<unknown> = unit): Variant<unknown> {
  return { tag, shape }
}

/**
 * A tagged union. The active variant's tag is written as a ULEB128 varint,
 * followed by its payload. Values are `{ kind, value }`.
 *
 * @example
 * const Shape = enumeration({
 *   Circle: variant(0, f64),
 *   Empty: variant(1),
 * })
 * serialize(Shape, { kind: "Circle", value: 1.5 })
 */
export function enumeration<V extends Variants>(variants: V, name?: string): Shape<EnumValue<V>> {
  const entries: [string, Variant<unknown>][] = Object.entries(variants)
  const shapeName = name ?? `enum{${entries.map(([kind]) => kind).join("|")}}`

  const byKind = new Map<string, Variant<unknown>>()
  const byTag = new Map<number, readonly [string, Variant<unknown>]>()

  for (const [kind, v] of entries) {
    if (!Number.isInteger(v.tag) || v.tag < 0 || v.tag > MAX_U32) {
      throw CodecError.invalidShape({ shape: shapeName, reason: `tag of "${kind}" must be an integer in 0..${MAX_U32}` })
    }

    const taken = byTag.get(v.tag)
    if (taken) {
      throw CodecError.invalidShape({
        shape: shapeName,
        reason: `"${kind}" reuses tag ${v.tag} of "${taken[0]}"`,
      })
    }

    byKind.set(kind, v)
    byTag.set(v.tag, [kind, v])
  }

  return {
    kind: "sum",
    name: shapeName,
    write(sink, value, depth) {
      const tagged: unknown = value
      const kind = isRecord(tagged) ? tagged.kind : undefined
      const active = typeof kind === "string" ? byKind.get(kind) : undefined

      if (!isRecord(tagged) || !active) {
        throw CodecError.invalidValue({ shape: shapeName, reason: "unknown variant kind", received: kind })
      }

      const inner = descend(depth, sink.limits)
      writeUleb128(sink, active.tag)
      active.shape.write(sink, tagged.value, inner)
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      const offset = source.offset
      const tag = readUleb128(source)
      const match = byTag.get(tag)

      if (!match) throw CodecError.unknownVariantTag({ offset, tag, shape: shapeName })

      const [kind, active] = match
      const decoded: unknown = { kind, value: active.shape.read(source, inner) }

      return decoded as EnumValue<V>
    },
  }
}

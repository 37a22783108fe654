import type { ByteSink, ByteSource } from "../../ports/cursor"
import type { Shape } from "../../ports/shape"
import { descend } from "../depth"
import { CodecError } from "../errors/codec-error"
import { compareBytes } from "../io/compare-bytes"
import { readLength, writeLength } from "../varint/uleb128"

type EncodedEntry = {
  key: Uint8Array
  value?: Uint8Array
}

function encodeSeparately<T>(sink: ByteSink, shape: Shape<T>, value: T, depth: number): Uint8Array {
  const scratch = sink.fork()
  shape.write(scratch, value, depth)
  return scratch.toBytes()
}

function writeSorted(sink: ByteSink, entries: EncodedEntry[], shape: string): void {
  entries.sort((a, b) => compareBytes(a.key, b.key))

  let previous: Uint8Array | undefined
  for (const entry of entries) {
    if (previous && compareBytes(previous, entry.key) === 0) throw CodecError.duplicateKey({ shape })
    previous = entry.key
  }

  for (const entry of entries) {
    sink.writeBytes(entry.key)
    if (entry.value) sink.writeBytes(entry.value)
  }
}

/**
 * Reads one key and checks it sorts strictly after the previous key's bytes.
 * Keys with distinct bytes that a `Map` or `Set` treats as equal (NaNs with
 * different payloads, `0` and `-0`) are duplicates. A lone `-0` would be
 * stored as `0`, so it is refused too.
 */
function readOrderedKey<K>(
  source: ByteSource,
  shape: Shape<K>,
  depth: number,
  previous: Uint8Array | undefined,
  seen: { has(key: K): boolean },
  name: string,
): { key: K; bytes: Uint8Array } {
  const offset = source.offset
  const key = shape.read(source, depth)
  const bytes = source.span(offset, source.offset)

  if (previous) {
    const order = compareBytes(previous, bytes)
    if (order === 0) throw CodecError.duplicateKey({ offset, shape: name })
    if (order > 0) throw CodecError.mapNotCanonicallyOrdered({ offset, shape: name })
  }
  if (seen.has(key)) throw CodecError.duplicateKey({ offset, shape: name })
  if (Object.is(key, -0)) throw CodecError.nonCanonicalKey({ offset, shape: name })

  return { key, bytes }
}

/**
 * A map encoded as an entry count followed by key/value pairs sorted by the
 * bytes of each encoded key. Insertion order of the `Map` does not matter.
 */
export function map<K, V>(key: Shape<K>, value: Shape<V>, name = `map<${key.name},${value.name}>`): Shape<Map<K, V>> {
  return {
    kind: "container",
    name,
    write(sink, entries, depth) {
      if (!(entries instanceof Map)) {
        throw CodecError.invalidValue({ shape: name, reason: "expected a Map", received: entries })
      }

      const inner = descend(depth, sink.limits)
      writeLength(sink, entries.size)

      const encoded: EncodedEntry[] = []
      for (const [k, v] of entries) {
        encoded.push({
          key: encodeSeparately(sink, key, k, inner),
          value: encodeSeparately(sink, value, v, inner),
        })
      }

      writeSorted(sink, encoded, name)
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      const length = readLength(source)
      const out = new Map<K, V>()

      let previous: Uint8Array | undefined
      for (let i = 0; i < length; i++) {
        const entry = readOrderedKey(source, key, inner, previous, out, name)
        previous = entry.bytes
        out.set(entry.key, value.read(source, inner))
      }

      return out
    },
  }
}

/** A set, laid out as a map without values. */
export function set<K>(key: Shape<K>, name = `set<${key.name}>`): Shape<Set<K>> {
  return {
    kind: "container",
    name,
    write(sink, members, depth) {
      if (!(members instanceof Set)) {
        throw CodecError.invalidValue({ shape: name, reason: "expected a Set", received: members })
      }

      const inner = descend(depth, sink.limits)
      writeLength(sink, members.size)

      const encoded: EncodedEntry[] = []
      for (const k of members) encoded.push({ key: encodeSeparately(sink, key, k, inner) })

      writeSorted(sink, encoded, name)
    },
    read(source, depth) {
      const inner = descend(depth, source.limits, source.offset)
      const length = readLength(source)
      const out = new Set<K>()

      let previous: Uint8Array | undefined
      for (let i = 0; i < length; i++) {
        const entry = readOrderedKey(source, key, inner, previous, out, name)
        previous = entry.bytes
        out.add(entry.key)
      }

      return out
    },
  }
}

import type { Shape } from "../../ports/shape"

/**
 * Defers building a shape until it is first used, so a shape can refer to
 * itself. Adds no nesting level of its own.
 *
 * @example
 * type List = { value: number; next: List | null }
 * const List: Shape<List> = struct({ value: u32, next: option(lazy(() => List)) })
 */
export function lazy<T>(resolve: () => Shape<T>, name = "lazy"): Shape<T> {
  let resolved: Shape<T> | undefined
  const target = (): Shape<T> => (resolved ??= resolve())

  return {
    kind: "lazy",
    name,
    get width() {
      return target().width
    },
    get nullable() {
      return target().nullable
    },
    write(sink, value, depth) {
      target().write(sink, value, depth)
    },
    read(source, depth) {
      return target().read(source, depth)
    },
  }
}

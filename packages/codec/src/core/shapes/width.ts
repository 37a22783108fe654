import type { Shape } from "../../ports/shape"

/** Width of shapes laid out back to back, or `undefined` once any of them varies. */
export function combinedWidth(shapes: Iterable<Shape<unknown>>): number | undefined {
  let total = 0
  for (const shape of shapes) {
    if (shape.width === undefined) return undefined
    total += shape.width
  }

  return total
}

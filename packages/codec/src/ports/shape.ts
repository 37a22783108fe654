import type { ByteSink, ByteSource } from "./cursor"

export type ShapeKind = "primitive" | "product" | "sum" | "container" | "lazy"

/**
 * Structural description of a type whose values are `T`.
 *
 * `depth` is the nesting level of the enclosing value; composite and
 * container shapes increase it before delegating to their members.
 */
export interface Shape<T> {
  readonly kind: ShapeKind

  /** Diagnostic name used in errors and logs */
  readonly name: string

  /**
   * Encoded size in bytes when every value takes the same number. Shapes that
   * leave it unset take at least one byte per value.
   */
  readonly width?: number

  /** Whether `null` is one of this shape's values. */
  readonly nullable?: boolean

  write(sink: ByteSink, value: T, depth: number): void

  read(source: ByteSource, depth: number): T
}

export type Infer<S> = S extends Shape<infer T> ? T : never

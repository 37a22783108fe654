/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ MAX_DEPTH: z.coerce.number().int().default(500) }),
 *   sources: [new EnvSource({ prefix: "CODEC_" })],
 * })
 *
 * config.value.MAX_DEPTH    // 500
 * config.explain("MAX_DEPTH") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that contributed at least one value, without duplicates. */
  sourcesUsed(): string[]

  /** Keys supplied by sources that the schema does not define. */
  unknownKeys(): string[]
}

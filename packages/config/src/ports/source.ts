/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen downstream in the zod
 * schema. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "object:overrides" */
  readonly name: string

  /** An `undefined` value means "not provided". */
  load(): Promise<Record<string, unknown>>
}

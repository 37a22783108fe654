export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

export function isUnknownArray(v: unknown): v is readonly unknown[] {
  return Array.isArray(v)
}

/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** True for a 24-char hex string, the textual form of an ObjectId. */
export function isHex24(s: string | undefined): s is string {
  return !!s && /^[0-9a-fA-F]{24}$/.test(s);
}

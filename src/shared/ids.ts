/** Generate a short unique ID for connections, entropy values, etc. */
export function genId(prefix = "id"): string {
  return `${prefix}-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

/** Random 32-bit unsigned integer, as returned by the info endpoint. */
export function genEntropy(): number {
  return Math.floor(Math.random() * 0x1_0000_0000);
}

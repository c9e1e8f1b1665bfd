/** Closing-reason codes carried by close frames. */
export const CLOSE_CODES = {
  Interrupted: { code: 1002, reason: "Connection interrupted" },
  GoAway: { code: 3000, reason: "Go away!" },
  AlreadyOpen: { code: 2010, reason: "Another connection still open" },
  InternalError: { code: 1011, reason: "Internal error" },
  InvalidPayload: { code: 1007, reason: "Broken JSON encoding" },
} as const;

export type CloseCodeName = keyof typeof CLOSE_CODES;

export interface CloseCode {
  name: CloseCodeName;
  code: number;
  reason: string;
}

export function closeCodeFor(name: CloseCodeName): CloseCode {
  const { code, reason } = CLOSE_CODES[name];
  return { name, code, reason };
}

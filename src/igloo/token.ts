// pattern: Functional Core

/**
 * Continuation tokens for paginated search.
 * A token records the offset of the first raw record not yet consumed and a
 * fingerprint of the query it belongs to, so any later call (in this process or
 * another) can resume the same traversal.
 */

import { z } from "zod";
import { ValidationError } from "../errors/index.js";

export type TokenState = {
  readonly offset: number;
  readonly fingerprint: string;
};

const TokenSchema = z.object({
  v: z.literal(1),
  o: z.number().int().nonnegative(),
  f: z.string().min(1),
});

export function encodeToken(state: TokenState): string {
  const payload = { v: 1, o: state.offset, f: state.fingerprint };
  return Buffer.from(JSON.stringify(payload), "utf-8").toString("base64url");
}

export function decodeToken(token: string): TokenState {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf-8"));
  } catch (error) {
    throw new ValidationError(
      "pageToken",
      `malformed continuation token: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = TokenSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("pageToken", "malformed continuation token");
  }

  return { offset: parsed.data.o, fingerprint: parsed.data.f };
}

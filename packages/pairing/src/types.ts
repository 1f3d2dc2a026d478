import { ConfigurationInvalidError } from "@meridian/errors";
import { z } from "zod";

const PairingConfigSchema = z.object({
  codeLength: z.number().int().min(4, "must be an integer >= 4"),
  ttlMs: z.number().int().positive("must be > 0"),
});

export type PairingConfig = Readonly<z.infer<typeof PairingConfigSchema>>;

/** Eight characters, valid for ten minutes. */
export const DEFAULT_PAIRING_CONFIG: PairingConfig = {
  codeLength: 8,
  ttlMs: 600_000,
};

/** What an owner receives from issueCode. */
export interface IssuedCode {
  readonly code: string;
  readonly formatted: string;
  readonly ownerId: string;
  readonly expiresAt: string;
}

/** @throws ConfigurationInvalidError */
export function validatePairingConfig(config: PairingConfig): void {
  const parsed = PairingConfigSchema.safeParse(config);
  if (parsed.success) return;
  throw new ConfigurationInvalidError(
    parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    })),
  );
}

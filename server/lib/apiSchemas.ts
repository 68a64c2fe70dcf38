/**
 * Zod schemas for everything that crosses the process boundary: the broker's
 * token and option-chain responses and the on-disk credential record.
 */

import { z } from 'zod';
import { buildMalformedPayloadError } from './errors.js';

// ---------------------------------------------------------------------------
// OAuth token endpoint
// ---------------------------------------------------------------------------

export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    // Some providers keep the old refresh token and omit this field.
    refresh_token: z.string().min(1).optional(),
    expires_in: z.number().optional(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const TokenErrorResponseSchema = z
  .object({
    error: z.string(),
    error_description: z.string().optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Option chain  (marketdata/v1/chains)
// ---------------------------------------------------------------------------

const OptionContractSchema = z
  .object({
    putCall: z.enum(['CALL', 'PUT']).optional(),
    symbol: z.string().optional(),
    strikePrice: z.number(),
    expirationDate: z.string().optional(),
    openInterest: z.number().nullable().optional(),
    gamma: z.number().nullable().optional(),
    vega: z.number().nullable().optional(),
    multiplier: z.number().nullable().optional(),
    quoteTimeInLong: z.number().optional(),
  })
  .passthrough();

export type OptionContract = z.infer<typeof OptionContractSchema>;

/** `{ "2025-03-21:5": { "590.0": [contract, …] } }` */
const ExpDateMapSchema = z.record(z.string(), z.record(z.string(), z.array(OptionContractSchema)));

export type ExpDateMap = z.infer<typeof ExpDateMapSchema>;

export const OptionChainResponseSchema = z
  .object({
    symbol: z.string().optional(),
    status: z.string().optional(),
    underlyingPrice: z.number().nullable().optional(),
    underlying: z
      .object({
        last: z.number().nullable().optional(),
        mark: z.number().nullable().optional(),
        quoteTime: z.number().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    callExpDateMap: ExpDateMapSchema.default({}),
    putExpDateMap: ExpDateMapSchema.default({}),
  })
  .passthrough();

export type OptionChainResponse = z.infer<typeof OptionChainResponseSchema>;

// ---------------------------------------------------------------------------
// Credential record on disk
// ---------------------------------------------------------------------------

const IsoInstantSchema = z.string().datetime({ offset: true });

export const CredentialFileSchema = z.object({
  accessToken: z.string().min(1),
  accessIssuedAt: IsoInstantSchema,
  refreshToken: z.string().min(1),
  refreshIssuedAt: IsoInstantSchema,
  tokenType: z.string().optional(),
  scope: z.string().optional(),
});

export type CredentialFile = z.infer<typeof CredentialFileSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed payload. Failure throws a malformed-payload error naming
 * the first few offending paths so the caller can log and skip the source.
 */
export function parseApiResponse<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  payload: unknown,
  label: string,
): Output {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  const issues = result.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  throw buildMalformedPayloadError(`${label}: response failed validation — ${issues}`);
}

/**
 * Wire shapes of the assertion API, validated with zod.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/** Nullable display strings collapse to '' */
const displayText = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

export const responseStatusSchema = z.object({
  type: z.string(),
  message: displayText,
  error: z.boolean(),
  code: z.number().int(),
});

/**
 * Response envelope. `data` is left undecoded here: its shape depends on
 * its JSON kind and is decided by the classifier.
 */
export const responseEnvelopeSchema = z.object({
  status: responseStatusSchema,
  data: z.unknown().optional(),
});

/**
 * Matches any body whose status block sets `error: true`, whatever else it
 * carries or lacks.
 */
export const errorFlagSchema = z.object({
  status: z.object({ error: z.literal(true) }),
});

/**
 * Status block fields of a rejection; each one may be absent.
 */
export const rejectionStatusSchema = z.object({
  type: z.string().catch(''),
  message: z.string().catch(''),
  code: z.number().int().optional().catch(undefined),
});

export const rawDeviceSchema = z.object({
  device_id: z.number().int(),
  device_type: z.string(),
});

export const rawFactorUserSchema = z.object({
  id: z.number().int(),
  username: displayText,
  email: displayText,
  firstname: displayText,
  lastname: displayText,
});

const EMPTY_FACTOR_USER: z.output<typeof rawFactorUserSchema> = {
  id: 0,
  username: '',
  email: '',
  firstname: '',
  lastname: '',
};

export const rawFactorSchema = z.object({
  state_token: z.string(),
  devices: z.array(rawDeviceSchema),
  callback_url: displayText,
  // Informational only; a missing user never rejects the challenge
  user: rawFactorUserSchema.nullish().transform((user) => user ?? EMPTY_FACTOR_USER),
});

export const rawFactorListSchema = z.array(rawFactorSchema);

export type RawDevice = z.infer<typeof rawDeviceSchema>;
export type RawFactor = z.infer<typeof rawFactorSchema>;

/**
 * Body of `POST /api/1/saml_assertion`.
 */
export interface GenerateRequestBody {
  readonly username_or_email: string;
  readonly password: string;
  readonly app_id: string;
  readonly subdomain: string;
  readonly ip_address?: string;
}

/**
 * Body of `POST /api/1/saml_assertion/verify_factor`.
 */
export interface VerifyFactorRequestBody {
  readonly app_id: string;
  readonly device_id: string;
  readonly state_token: string;
  readonly otp_token: string;
  readonly do_not_notify: boolean;
}

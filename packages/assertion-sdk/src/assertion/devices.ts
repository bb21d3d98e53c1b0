/**
 * MFA device expansion.
 *
 * Some device types accept both a typed one-time code and a push approval.
 * Each such device is offered twice so the user can pick the interaction.
 *
 * @packageDocumentation
 */

import type { RawDevice, RawFactor } from './schemas.js';
import type { Device, Factor } from './types.js';

export const ONELOGIN_PROTECT = 'OneLogin Protect';

/**
 * Push-capable device types, mapped to the label of their push entry.
 */
export const PUSH_NOTIFY_DEVICE_TYPES: ReadonlyMap<string, string> = new Map([
  [ONELOGIN_PROTECT, `Notify to ${ONELOGIN_PROTECT}`],
]);

/**
 * Expands one provider device into its selectable entries.
 *
 * The code entry always comes first. Unknown device types yield a single
 * code entry.
 *
 * @example
 * ```typescript
 * expandDevice({ device_id: 42, device_type: 'OneLogin Protect' });
 * // => [
 * //   { deviceId: 42, deviceType: 'OneLogin Protect', requiresOtpToken: true },
 * //   { deviceId: 42, deviceType: 'Notify to OneLogin Protect', requiresOtpToken: false },
 * // ]
 * ```
 */
export const expandDevice = (raw: RawDevice): readonly Device[] => {
  const otpEntry: Device = {
    deviceId: raw.device_id,
    deviceType: raw.device_type,
    requiresOtpToken: true,
  };

  const pushLabel = PUSH_NOTIFY_DEVICE_TYPES.get(raw.device_type);
  if (pushLabel === undefined) {
    return [otpEntry];
  }

  return [otpEntry, { deviceId: raw.device_id, deviceType: pushLabel, requiresOtpToken: false }];
};

/**
 * Expands a device list, preserving provider order.
 */
export const expandDevices = (raw: readonly RawDevice[]): readonly Device[] =>
  raw.flatMap((device) => expandDevice(device));

/**
 * Converts a raw provider factor into the client model.
 */
export const toFactor = (raw: RawFactor): Factor => ({
  stateToken: raw.state_token,
  devices: expandDevices(raw.devices),
  callbackUrl: raw.callback_url,
  user: {
    id: raw.user.id,
    username: raw.user.username,
    email: raw.user.email,
    firstName: raw.user.firstname,
    lastName: raw.user.lastname,
  },
});

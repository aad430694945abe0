/**
 * Multi-hot encoding of the keys held in one item, in recording-key order.
 * Keys outside the recording set are not encoded.
 */
export function keysToDirections(keyCodes: readonly string[], recordingKeys: readonly string[]): Uint8Array {
  const held = new Set(keyCodes.map((k) => k.toLowerCase()));
  const out = new Uint8Array(recordingKeys.length);
  recordingKeys.forEach((key, i) => {
    out[i] = held.has(key.toLowerCase()) ? 1 : 0;
  });
  return out;
}

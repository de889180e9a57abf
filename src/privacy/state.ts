export type PrivacyState =
  | { readonly cameraName: string; readonly privacyEnabled: false; readonly enabledAtTimestamp: null }
  | { readonly cameraName: string; readonly privacyEnabled: true; readonly enabledAtTimestamp: number };

export function privacyOff(cameraName: string): PrivacyState {
  return { cameraName, privacyEnabled: false, enabledAtTimestamp: null };
}

export function privacyOn(cameraName: string, enabledAtTimestamp: number): PrivacyState {
  return { cameraName, privacyEnabled: true, enabledAtTimestamp };
}

/** Milliseconds until the auto-disable fires, or null when no timeout applies. */
export function remainingTimeout(state: PrivacyState, timeoutMinutes: number, now: number): number | null {
  if (!state.privacyEnabled || timeoutMinutes <= 0) {
    return null;
  }
  return Math.max(0, state.enabledAtTimestamp + timeoutMinutes * 60_000 - now);
}

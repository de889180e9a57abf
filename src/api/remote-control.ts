export type IrMode = 'off' | 'auto';

export type RemoteFailureKind = 'not-found' | 'transient' | 'unsupported';

export type RemoteResult =
  | { ok: true }
  | { ok: false; kind: RemoteFailureKind; message: string };

export interface RemoteCamera {
  id: string;
  name: string;
  privacyEnabled: boolean;
}

/**
 * Camera-side effects of a privacy transition. Every call is independently fallible and
 * reports why it failed instead of throwing.
 */
export interface RemoteControl {
  listCameras(): RemoteCamera[];
  /** Exact (case-sensitive) name match first, then id. */
  findCamera(nameOrId: string): RemoteCamera | null;
  setPrivacy(cameraName: string, enabled: boolean): Promise<RemoteResult>;
  setLed(cameraName: string, on: boolean): Promise<RemoteResult>;
  setIr(cameraName: string, mode: IrMode): Promise<RemoteResult>;
  setMic(cameraName: string, on: boolean): Promise<RemoteResult>;
}

export const REMOTE_OK: RemoteResult = { ok: true };

export function remoteFailure(kind: RemoteFailureKind, message: string): RemoteResult {
  return { ok: false, kind, message };
}

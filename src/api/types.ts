export interface ProtectFeatureFlags {
  hasLedIr?: boolean;
  hasLedStatus?: boolean;
  hasMic?: boolean;
}

export interface ProtectPrivacyZone {
  id: number;
  name: string;
  color: string;
  points: [number, number][];
}

export type ProtectIrLedMode = 'auto' | 'autoFilterOnly' | 'on' | 'off' | 'custom';

export interface ProtectCamera {
  id: string;
  name: string;
  type: string;
  mac: string;
  host: string;
  featureFlags?: ProtectFeatureFlags;
  ledSettings?: LedSettings;
  ispSettings?: {
    irLedMode: ProtectIrLedMode;
  };
  micVolume?: number;
  privacyZones?: ProtectPrivacyZone[];
}

export interface ProtectBootstrap {
  cameras: ProtectCamera[];
  lastUpdateId: string;
}

export interface LedSettings {
  isEnabled: boolean;
  blinkRate?: number;
}

export type ProtectCameraPayload =
  | { privacyZones: ProtectPrivacyZone[] }
  | { ledSettings: LedSettings }
  | { ispSettings: { irLedMode: ProtectIrLedMode } }
  | { micVolume: number };

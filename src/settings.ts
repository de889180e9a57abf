export const PLUGIN_NAME = 'homebridge-protect-privacy-buttons';
export const PLATFORM_NAME = 'Protect Privacy Buttons';

export const DEFAULT_DEBOUNCE_SECONDS = 0.3;
export const DEFAULT_POLLING_INTERVAL_SECONDS = 0.1;
export const DEFAULT_STARTUP_DELAY_SECONDS = 5;
export const DEFAULT_TIMEOUT_MINUTES = 60;
export const DEFAULT_REMOTE_TIMEOUT_SECONDS = 10;
// Homebridge force-exits 5 seconds after signalling shutdown.
export const DEFAULT_SHUTDOWN_TIMEOUT_SECONDS = 4;

export const STATE_DIRECTORY = 'protect-privacy-buttons';
export const STATE_FILE_NAME = 'privacy_state_{camera}.json';
export const CAMERA_PLACEHOLDER = '{camera}';

export interface ControllerConfig {
  address: string;
  username: string;
  password: string;
}

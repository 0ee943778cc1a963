// App-event telemetry for the Extensions page.
// The host supplies the transport; the page only names the events.

export interface Telemetry {
  reportAppEvent(name: string): void
}

export const TELEMETRY_EVENTS = {
  INSTALL_EXTENSION: 'extensions: install extension',
  UNINSTALL_EXTENSION: 'extensions: uninstall extension',
} as const

/** Reported by the workspace when the page becomes the active item */
export const PAGE_TELEMETRY_TEXT = 'extensions page'

export const noopTelemetry: Telemetry = {
  reportAppEvent() {},
}

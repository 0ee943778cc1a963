// Contracts between the Extensions page and the editor workspace hosting it.

export interface TabLabel {
  text: string
  /** Rendered in the muted text colour (unselected tabs) */
  muted: boolean
}

/**
 * An item that can live in a workspace pane
 */
export interface WorkspaceItem {
  readonly kind: string
  tabLabel(selected: boolean): TabLabel
  /** Reported as an app event when the item is activated; null reports nothing */
  readonly telemetryEventText: string | null
  readonly showToolbar: boolean
  /** The item to show in a new split, or null to leave the split empty */
  cloneOnSplit(): WorkspaceItem | null
}

export interface Workspace {
  addItemToActivePane(item: WorkspaceItem): void
  /** Pick a single directory (no files); resolves null when cancelled */
  promptForDirectory(): Promise<string | null>
}

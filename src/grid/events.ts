import type { HighlightAttrDict } from "./highlightAttrMap.js"

/** `[text, highlightId?, repeat?]`; a missing or null id carries over from the previous run. */
export type GridLineRun = readonly [text: string, highlightId?: number | null, repeat?: number]

export interface GridResizeEvent {
  readonly kind: "grid_resize"
  readonly handle: number
  readonly width: number
  readonly height: number
}

export interface GridLineEvent {
  readonly kind: "grid_line"
  readonly handle: number
  readonly row: number
  readonly colStart: number
  readonly runs: ReadonlyArray<GridLineRun>
  readonly wrap: boolean
}

export interface GridClearEvent {
  readonly kind: "grid_clear"
  readonly handle: number
}

export interface GridDestroyEvent {
  readonly kind: "grid_destroy"
  readonly handle: number
}

export interface GridScrollEvent {
  readonly kind: "grid_scroll"
  readonly handle: number
  readonly top: number
  readonly bottom: number
  readonly left: number
  readonly right: number
  readonly rows: number
  readonly cols: number
}

export interface GridCursorGotoEvent {
  readonly kind: "grid_cursor_goto"
  readonly handle: number
  readonly row: number
  readonly col: number
}

export interface DefaultColorsSetEvent {
  readonly kind: "default_colors_set"
  readonly foreground: number | null
  readonly background: number | null
  readonly special: number | null
}

export interface HlAttrDefineEvent {
  readonly kind: "hl_attr_define"
  readonly id: number
  readonly attrs: HighlightAttrDict
}

export interface FlushEvent {
  readonly kind: "flush"
}

export type GridEvent =
  | GridResizeEvent
  | GridLineEvent
  | GridClearEvent
  | GridDestroyEvent
  | GridScrollEvent
  | GridCursorGotoEvent

export type RedrawEvent = GridEvent | DefaultColorsSetEvent | HlAttrDefineEvent | FlushEvent

export type RedrawEventKind = RedrawEvent["kind"]

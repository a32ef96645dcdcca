import React, { useEffect, useState } from "react"
import { Box, Text } from "ink"
import type { ChalkInstance } from "chalk"
import type { Grid } from "../../grid/grid.js"
import { renderFrameLines, type AttrResolver } from "../frameRender.js"

interface GridViewProps {
  readonly grid: Grid
  readonly highlights: AttrResolver
  readonly painter: ChalkInstance
  readonly showCursor?: boolean
}

/**
 * Draws one grid from the frame published by its last flush, never from the
 * live cells, so a render triggered by anything else still shows the last
 * complete frame.
 */
export const GridView: React.FC<GridViewProps> = ({ grid, highlights, painter, showCursor = true }) => {
  const [lines, setLines] = useState<string[] | null>(null)

  useEffect(() => {
    const draw = (target: Grid) => {
      const frame = target.lastFrame
      setLines(frame ? renderFrameLines(frame, highlights, painter, { showCursor }) : null)
    }
    draw(grid)
    return grid.subscribe(draw)
  }, [grid, highlights, painter, showCursor])

  if (!lines) {
    return <Text dimColor>waiting for redraw…</Text>
  }
  return (
    <Box flexDirection="column">
      {lines.map((line, index) => (
        <Text key={index} wrap="truncate">
          {line}
        </Text>
      ))}
    </Box>
  )
}

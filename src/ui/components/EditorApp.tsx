import React, { useEffect, useState } from "react"
import { Box, Text, useInput } from "ink"
import type { ChalkInstance } from "chalk"
import type { Grid } from "../../grid/grid.js"
import { keyToInput } from "../../input/keymap.js"
import type { EditorSession } from "../../session/editorSession.js"
import { COLORS } from "../theme.js"
import { GridView } from "./GridView.js"

export const STATUS_HINT = "Alt-X Exit  Alt-D Dump"

interface EditorAppProps {
  readonly session: EditorSession
  readonly painter: ChalkInstance
  /** Writes a text dump of every grid; resolves to the message shown in the status line. */
  readonly onDump?: () => Promise<string>
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))

export const EditorApp: React.FC<EditorAppProps> = ({ session, painter, onDump }) => {
  const [grids, setGrids] = useState<Grid[]>(() => session.registry.list())
  const [status, setStatus] = useState("")

  useEffect(() => {
    setGrids(session.registry.list())
    return session.registry.onGridCreated(() => setGrids(session.registry.list()))
  }, [session])

  useInput((input, key) => {
    if (key.meta && input === "x") {
      setStatus("Exiting…")
      void session.stop()
      return
    }
    if (key.meta && input === "d") {
      if (!onDump) return
      void onDump().then(setStatus, (error: unknown) => setStatus(`Dump failed: ${describeError(error)}`))
      return
    }
    const keys = keyToInput(input, key)
    if (keys) session.sendKeys(keys)
  })

  return (
    <Box flexDirection="column">
      {grids.length === 0 ? <Text dimColor>waiting for redraw…</Text> : null}
      {grids.map((grid) => (
        <Box key={grid.handle} flexDirection="column" borderStyle="round" borderColor={COLORS.border}>
          <Text color={COLORS.accent}>{`NeoVim · grid ${grid.handle}`}</Text>
          <GridView grid={grid} highlights={session.highlights} painter={painter} />
        </Box>
      ))}
      <Box>
        <Text color={COLORS.muted}>{STATUS_HINT}</Text>
        {status ? <Text>{`  ${status}`}</Text> : null}
      </Box>
    </Box>
  )
}

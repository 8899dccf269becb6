/**
 * migrations.ts
 *
 * Upgrade-on-load for snapshot documents. Raw documents are first migrated
 * step by step to the current schema version, then validated into a typed
 * PlannerDocument.
 *
 * Version history:
 * - 1: one grid per workspace (`workspace.grid`)
 * - 2: one grid per surface (`workspace.grids[surfaceId]`)
 */

import { DEFAULT_SURFACE_ID, DEFAULT_UNDO_CAPACITY, SCHEMA_VERSION } from "@/lib/constants"
import { COMMAND_TYPES, type CommandType } from "@/types/commands"
import type { Color, RegionProps } from "@/types/planner"
import { PlannerError } from "@/lib/errors"
import type {
  CommandData,
  GridData,
  HistoryEntryData,
  ImageData,
  PlannerDocument,
  PlayerDocument,
  RegionData,
  WorkspaceDocument,
} from "./types"
import {
  arrayOf,
  field,
  invalid,
  isRecord,
  nullable,
  readInteger,
  readNumber,
  readRecord,
  readString,
  recordOf,
  type Reader,
} from "./validate"

type RawDocument = Record<string, unknown>

interface Migration {
  from: number
  migrate: (doc: RawDocument) => RawDocument
}

/** v1 → v2: copy the workspace grid onto every surface that has an image */
function perSurfaceGrids(doc: RawDocument): RawDocument {
  const workspaces = readRecord(doc.workspaces ?? {}, "workspaces")
  const upgraded: Record<string, unknown> = {}
  for (const [id, value] of Object.entries(workspaces)) {
    const workspace = readRecord(value, `workspaces.${id}`)
    const { grid, ...rest } = workspace
    if (grid === undefined || rest.grids !== undefined) {
      upgraded[id] = rest.grids !== undefined ? rest : workspace
      continue
    }
    const images = isRecord(rest.images) ? rest.images : {}
    const surfaces = Object.keys(images)
    const grids: Record<string, unknown> = {}
    for (const surfaceId of surfaces.length > 0 ? surfaces : [DEFAULT_SURFACE_ID]) {
      grids[surfaceId] = isRecord(grid) ? { ...grid } : grid
    }
    upgraded[id] = { ...rest, grids }
  }
  return { ...doc, version: 2, workspaces: upgraded }
}

const MIGRATIONS: readonly Migration[] = [{ from: 1, migrate: perSurfaceGrids }]

// Readers -----------------------------------------------------------------------

const readColor: Reader<Color> = (value, path) => {
  const record = readRecord(value, path)
  return {
    r: field(record, "r", path, readNumber),
    g: field(record, "g", path, readNumber),
    b: field(record, "b", path, readNumber),
    a: record.a === undefined ? 1 : field(record, "a", path, readNumber),
  }
}

const readRegion: Reader<RegionData> = (value, path) => {
  const record = readRecord(value, path)
  return {
    id: field(record, "id", path, readInteger),
    name: field(record, "name", path, readString),
    color: field(record, "color", path, readColor),
    order: field(record, "order", path, readNumber),
  }
}

const readRegionProps: Reader<RegionProps> = (value, path) => {
  const record = readRecord(value, path)
  return {
    name: field(record, "name", path, readString),
    color: field(record, "color", path, readColor),
  }
}

const readGrid: Reader<GridData> = (value, path) => {
  const record = readRecord(value, path)
  const grid = {
    width: field(record, "width", path, readNumber),
    height: field(record, "height", path, readNumber),
    xOffset: field(record, "xOffset", path, readNumber),
    yOffset: field(record, "yOffset", path, readNumber),
  }
  if (grid.width <= 0 || grid.height <= 0) invalid(path, "a grid with positive width and height")
  return grid
}

const readCells = recordOf(readInteger)
const readOrders = recordOf(readNumber)

const readImage: Reader<ImageData> = (value, path) => {
  const record = readRecord(value, path)
  return { cells: field(record, "cells", path, readCells) }
}

function isCommandType(value: unknown): value is CommandType {
  return COMMAND_TYPES.some((type) => type === value)
}

const readCommand: Reader<CommandData> = (value, path) => {
  const record = readRecord(value, path)
  const type = record.type
  if (!isCommandType(type)) return invalid(`${path}.type`, "a known command type")
  const base = {
    workspaceId: field(record, "workspaceId", path, readString),
    userId: field(record, "userId", path, readString),
    timestamp: field(record, "timestamp", path, readNumber),
  }
  switch (type) {
    case "region-add":
      return { ...base, type, region: field(record, "region", path, readRegion) }
    case "region-edit":
      return {
        ...base,
        type,
        regionId: field(record, "regionId", path, readInteger),
        before: field(record, "before", path, readRegionProps),
        after: field(record, "after", path, readRegionProps),
      }
    case "region-delete":
      return {
        ...base,
        type,
        region: field(record, "region", path, readRegion),
        replacementId: field(record, "replacementId", path, nullable(readInteger)),
        affectedCells: field(record, "affectedCells", path, recordOf(arrayOf(readString))),
        beforeOrders: field(record, "beforeOrders", path, readOrders),
      }
    case "region-move":
      return {
        ...base,
        type,
        regionId: field(record, "regionId", path, readInteger),
        delta: field(record, "delta", path, readInteger),
        beforeOrders: field(record, "beforeOrders", path, readOrders),
        afterOrders: field(record, "afterOrders", path, readOrders),
      }
    case "fill-cells":
      return {
        ...base,
        type,
        surfaceId: field(record, "surfaceId", path, readString),
        regionId: field(record, "regionId", path, nullable(readInteger)),
        previous: field(record, "previous", path, recordOf(nullable(readInteger))),
      }
    case "grid-change":
      return {
        ...base,
        type,
        surfaceId: field(record, "surfaceId", path, readString),
        before: field(record, "before", path, readGrid),
        after: field(record, "after", path, readGrid),
      }
    case "reproject":
      return {
        ...base,
        type,
        surfaceId: field(record, "surfaceId", path, readString),
        beforeGrid: field(record, "beforeGrid", path, readGrid),
        afterGrid: field(record, "afterGrid", path, readGrid),
        beforeCells: field(record, "beforeCells", path, readCells),
        afterCells: field(record, "afterCells", path, readCells),
      }
  }
}

/** History entries that fail validation are dropped rather than failing the load */
const readHistory: Reader<HistoryEntryData[]> = (value, path) => {
  if (value === undefined) return []
  if (!Array.isArray(value)) return invalid(path, "an array")
  const entries: HistoryEntryData[] = []
  value.forEach((item, index) => {
    const itemPath = `${path}[${index}]`
    try {
      const record = readRecord(item, itemPath)
      entries.push({
        command: field(record, "command", itemPath, readCommand),
        description: field(record, "description", itemPath, readString),
      })
    } catch (error) {
      if (!(error instanceof PlannerError)) throw error
      console.warn("[Migrations] dropping unreadable history entry:", error.message)
    }
  })
  return entries
}

const readWorkspace: Reader<WorkspaceDocument> = (value, path) => {
  const record = readRecord(value, path)
  return {
    nextRegionId: field(record, "nextRegionId", path, readInteger),
    regions: field(record, "regions", path, recordOf(readRegion)),
    grids: field(record, "grids", path, recordOf(readGrid)),
    images: field(record, "images", path, recordOf(readImage)),
  }
}

const readPlayer: Reader<PlayerDocument> = (value, path) => {
  const record = readRecord(value, path)
  return {
    workspaceId: field(record, "workspaceId", path, nullable(readString)),
    selectedRegionId: field(record, "selectedRegionId", path, readInteger),
    selectedTool: field(record, "selectedTool", path, nullable(readString)),
    boundaryVisibilityLevel: field(record, "boundaryVisibilityLevel", path, readInteger),
    undo: field(record, "undo", path, readHistory),
    redo: field(record, "redo", path, readHistory),
  }
}

/**
 * Validate an untyped snapshot and upgrade it to the current schema version.
 * Throws PlannerError("invalid-argument") for malformed documents or
 * versions newer than this build understands.
 */
export function upgradeDocument(raw: unknown): PlannerDocument {
  let doc = readRecord(raw, "snapshot")
  const version = field(doc, "version", "snapshot", readInteger)
  if (version < 1 || version > SCHEMA_VERSION) {
    throw new PlannerError("invalid-argument", "loadSnapshot", `unsupported snapshot version ${version}`, {
      version,
    })
  }

  for (const migration of MIGRATIONS) {
    const current = field(doc, "version", "snapshot", readInteger)
    if (current === migration.from) {
      doc = migration.migrate(doc)
      console.log(`[Migrations] upgraded snapshot from version ${migration.from}`)
    }
  }

  return {
    version: SCHEMA_VERSION,
    savedAt: doc.savedAt === undefined ? 0 : field(doc, "savedAt", "snapshot", readNumber),
    undoCapacity:
      doc.undoCapacity === undefined
        ? DEFAULT_UNDO_CAPACITY
        : field(doc, "undoCapacity", "snapshot", readInteger),
    workspaces: field(doc, "workspaces", "snapshot", recordOf(readWorkspace)),
    players: doc.players === undefined ? {} : field(doc, "players", "snapshot", recordOf(readPlayer)),
  }
}

/**
 * serialize.ts
 *
 * Conversion between live planner state and snapshot documents. Maps become
 * plain records and sets become arrays; loading rebuilds frozen regions and
 * grids so restored state follows the same immutability rules as live state.
 */

import { EMPTY_REGION, EMPTY_REGION_ID, SCHEMA_VERSION } from "@/lib/constants"
import { writeCell } from "@/lib/grid/cellMap"
import { createRegion } from "@/lib/regions/regionStore"
import { PlannerStore, toVisibilityLevel, type PlannerStoreOptions } from "@/stores/plannerStore"
import type { Command, HistoryEntry } from "@/types/commands"
import type {
  CellKey,
  CellMap,
  GridDescriptor,
  PlayerState,
  Region,
  RegionId,
  SurfaceId,
  WorkspaceState,
} from "@/types/planner"
import type {
  CommandData,
  GridData,
  HistoryEntryData,
  PlannerDocument,
  PlayerDocument,
  RegionData,
  WorkspaceDocument,
} from "./types"

// Primitives --------------------------------------------------------------------

function regionToData(region: Region): RegionData {
  return { id: region.id, name: region.name, color: { ...region.color }, order: region.order }
}

function regionFromData(data: RegionData): Region {
  return createRegion(data.id, data.name, data.color, data.order)
}

function gridToData(grid: GridDescriptor): GridData {
  return { width: grid.width, height: grid.height, xOffset: grid.xOffset, yOffset: grid.yOffset }
}

function gridFromData(data: GridData): GridDescriptor {
  return Object.freeze({ ...data })
}

function mapToRecord<V>(entries: Iterable<[string | number, V]>): Record<string, V> {
  const record: Record<string, V> = {}
  for (const [key, value] of entries) record[String(key)] = value
  return record
}

function ordersFromRecord(record: Record<string, number>): Map<RegionId, number> {
  return new Map(Object.entries(record).map(([id, order]): [RegionId, number] => [Number(id), order]))
}

function cellsFromRecord(record: Record<CellKey, RegionId>): CellMap {
  const cells: CellMap = new Map()
  for (const [key, value] of Object.entries(record)) writeCell(cells, key, value)
  return cells
}

// Commands ----------------------------------------------------------------------

export function commandToData(command: Command): CommandData {
  const base = {
    workspaceId: command.workspaceId,
    userId: command.userId,
    timestamp: command.timestamp,
  }
  switch (command.type) {
    case "region-add":
      return { ...base, type: command.type, region: regionToData(command.region) }
    case "region-edit":
      return {
        ...base,
        type: command.type,
        regionId: command.regionId,
        before: { name: command.before.name, color: { ...command.before.color } },
        after: { name: command.after.name, color: { ...command.after.color } },
      }
    case "region-delete":
      return {
        ...base,
        type: command.type,
        region: regionToData(command.region),
        replacementId: command.replacementId,
        affectedCells: mapToRecord(
          Array.from(command.affectedCells, ([surfaceId, keys]): [string, CellKey[]] => [
            surfaceId,
            [...keys],
          ]),
        ),
        beforeOrders: mapToRecord(command.beforeOrders),
      }
    case "region-move":
      return {
        ...base,
        type: command.type,
        regionId: command.regionId,
        delta: command.delta,
        beforeOrders: mapToRecord(command.beforeOrders),
        afterOrders: mapToRecord(command.afterOrders),
      }
    case "fill-cells":
      return {
        ...base,
        type: command.type,
        surfaceId: command.surfaceId,
        regionId: command.regionId,
        previous: mapToRecord(command.previous),
      }
    case "grid-change":
      return {
        ...base,
        type: command.type,
        surfaceId: command.surfaceId,
        before: gridToData(command.before),
        after: gridToData(command.after),
      }
    case "reproject":
      return {
        ...base,
        type: command.type,
        surfaceId: command.surfaceId,
        beforeGrid: gridToData(command.beforeGrid),
        afterGrid: gridToData(command.afterGrid),
        beforeCells: mapToRecord(command.beforeCells),
        afterCells: mapToRecord(command.afterCells),
      }
  }
}

export function commandFromData(data: CommandData): Command {
  const base = { workspaceId: data.workspaceId, userId: data.userId, timestamp: data.timestamp }
  switch (data.type) {
    case "region-add":
      return { ...base, type: data.type, region: regionFromData(data.region) }
    case "region-edit":
      return {
        ...base,
        type: data.type,
        regionId: data.regionId,
        before: { name: data.before.name, color: { ...data.before.color } },
        after: { name: data.after.name, color: { ...data.after.color } },
      }
    case "region-delete":
      return {
        ...base,
        type: data.type,
        region: regionFromData(data.region),
        replacementId: data.replacementId === EMPTY_REGION_ID ? null : data.replacementId,
        affectedCells: new Map(
          Object.entries(data.affectedCells).map(([surfaceId, keys]): [string, CellKey[]] => [
            surfaceId,
            [...keys],
          ]),
        ),
        beforeOrders: ordersFromRecord(data.beforeOrders),
      }
    case "region-move":
      return {
        ...base,
        type: data.type,
        regionId: data.regionId,
        delta: data.delta,
        beforeOrders: ordersFromRecord(data.beforeOrders),
        afterOrders: ordersFromRecord(data.afterOrders),
      }
    case "fill-cells":
      return {
        ...base,
        type: data.type,
        surfaceId: data.surfaceId,
        regionId: data.regionId === EMPTY_REGION_ID ? null : data.regionId,
        previous: new Map(
          Object.entries(data.previous).map(([key, prev]): [CellKey, RegionId | null] => [
            key,
            prev === EMPTY_REGION_ID ? null : prev,
          ]),
        ),
      }
    case "grid-change":
      return {
        ...base,
        type: data.type,
        surfaceId: data.surfaceId,
        before: gridFromData(data.before),
        after: gridFromData(data.after),
      }
    case "reproject":
      return {
        ...base,
        type: data.type,
        surfaceId: data.surfaceId,
        beforeGrid: gridFromData(data.beforeGrid),
        afterGrid: gridFromData(data.afterGrid),
        beforeCells: cellsFromRecord(data.beforeCells),
        afterCells: cellsFromRecord(data.afterCells),
      }
  }
}

function entryToData(entry: HistoryEntry): HistoryEntryData {
  return { command: commandToData(entry.command), description: entry.description }
}

function entryFromData(data: HistoryEntryData): HistoryEntry {
  return { command: commandFromData(data.command), description: data.description }
}

// Workspaces and players --------------------------------------------------------

function workspaceToDocument(workspace: WorkspaceState): WorkspaceDocument {
  return {
    nextRegionId: workspace.nextRegionId,
    regions: mapToRecord(
      Array.from(workspace.regions, ([id, region]): [number, RegionData] => [id, regionToData(region)]),
    ),
    grids: mapToRecord(
      Array.from(workspace.grids, ([surfaceId, grid]): [string, GridData] => [surfaceId, gridToData(grid)]),
    ),
    images: mapToRecord(
      Array.from(workspace.images, ([surfaceId, cells]): [string, { cells: Record<CellKey, RegionId> }] => [
        surfaceId,
        { cells: mapToRecord(cells) },
      ]),
    ),
  }
}

function workspaceFromDocument(id: string, doc: WorkspaceDocument): WorkspaceState {
  const regions = new Map<RegionId, Region>([[EMPTY_REGION_ID, EMPTY_REGION]])
  let highest = 0
  for (const data of Object.values(doc.regions)) {
    if (data.id === EMPTY_REGION_ID) continue
    regions.set(data.id, regionFromData(data))
    highest = Math.max(highest, data.id)
  }
  return {
    id,
    // Never hand out an id that is still in use
    nextRegionId: Math.max(doc.nextRegionId, highest + 1),
    regions,
    grids: new Map(
      Object.entries(doc.grids).map(([surfaceId, grid]): [SurfaceId, GridDescriptor] => [
        surfaceId,
        gridFromData(grid),
      ]),
    ),
    images: new Map(
      Object.entries(doc.images).map(([surfaceId, image]): [SurfaceId, CellMap] => [
        surfaceId,
        cellsFromRecord(image.cells),
      ]),
    ),
  }
}

function playerToDocument(player: PlayerState, store: PlannerStore, userId: string): PlayerDocument {
  const { undo, redo } = store.history.get(userId)
  return {
    workspaceId: player.workspaceId,
    selectedRegionId: player.selectedRegionId,
    selectedTool: player.selectedTool,
    boundaryVisibilityLevel: player.boundaryVisibilityLevel,
    undo: undo.map(entryToData),
    redo: redo.map(entryToData),
  }
}

export function plannerToDocument(store: PlannerStore, savedAt: number = Date.now()): PlannerDocument {
  const workspaces: Record<string, WorkspaceDocument> = {}
  for (const [id, workspace] of Object.entries(store.$workspaces.get())) {
    workspaces[id] = workspaceToDocument(workspace)
  }
  const players: Record<string, PlayerDocument> = {}
  for (const [userId, player] of Object.entries(store.$players.get())) {
    players[userId] = playerToDocument(player, store, userId)
  }
  return {
    version: SCHEMA_VERSION,
    savedAt,
    undoCapacity: store.undoCapacity,
    workspaces,
    players,
  }
}

/**
 * Build a store from a (validated, current-version) document. The capacity
 * stored in the document applies unless the options override it.
 */
export function plannerFromDocument(
  doc: PlannerDocument,
  options: PlannerStoreOptions = {},
): PlannerStore {
  const store = new PlannerStore({ undoCapacity: doc.undoCapacity, ...options })
  for (const [id, workspaceDoc] of Object.entries(doc.workspaces)) {
    store.putWorkspace(workspaceFromDocument(id, workspaceDoc))
  }
  for (const [userId, playerDoc] of Object.entries(doc.players)) {
    store.updatePlayer(userId, {
      workspaceId: playerDoc.workspaceId,
      selectedRegionId: playerDoc.selectedRegionId,
      selectedTool: playerDoc.selectedTool,
      boundaryVisibilityLevel: toVisibilityLevel(playerDoc.boundaryVisibilityLevel),
    })
    store.history.restore(userId, {
      undo: playerDoc.undo.map(entryFromData),
      redo: playerDoc.redo.map(entryFromData),
    })
  }
  return store
}

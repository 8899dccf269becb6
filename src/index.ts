export { GridPlanner, type GridPlannerOptions, type SetGridOptions } from "@/lib/engine/planner"
export { CommandEngine, type ExecuteResult, type HistoryStepResult } from "@/lib/engine/commandEngine"
export {
  ChangeNotifier,
  guardReentrant,
  type BackendChange,
  type PlannerConsumer,
  type PlayerChangeKind,
} from "@/lib/notifications/notifier"
export { PlannerError, isPlannerError, type PlannerErrorCode } from "@/lib/errors"
export {
  DEFAULT_GRID,
  DEFAULT_REGIONS,
  DEFAULT_SURFACE_ID,
  DEFAULT_UNDO_CAPACITY,
  EMPTY_REGION,
  EMPTY_REGION_ID,
  SCHEMA_VERSION,
} from "@/lib/constants"
export { boundsOf, cellKey, cellOf, parseCellKey } from "@/lib/grid/geometry"
export { reprojectCells } from "@/lib/grid/reproject"
export { loadConfig, type PlannerConfig } from "@/lib/config"
export { PlannerStore, type PlannerStoreOptions } from "@/stores/plannerStore"
export { HistoryStore, type HistoryState } from "@/stores/historyStore"

export { upgradeDocument } from "@/lib/storage/migrations"
export { plannerFromDocument, plannerToDocument } from "@/lib/storage/serialize"
export { MemorySnapshotStore, type SnapshotStore } from "@/lib/storage/store"
export { LocalSnapshotStore } from "@/lib/storage/local-store"
export { FirestoreSnapshotStore } from "@/lib/storage/firestore-store"
export { HybridSnapshotStore, type SyncStatus } from "@/lib/storage/hybrid-store"
export { createSnapshotStore, openPlannerSession, type PlannerSession } from "@/lib/storage/storage-manager"
export { Autosaver, type AutosaveOptions } from "@/lib/storage/autosave"
export type { PlannerDocument, SnapshotMetadata } from "@/lib/storage/types"

export type * from "@/types/planner"
export type * from "@/types/commands"

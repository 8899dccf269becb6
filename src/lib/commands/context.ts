import type { ChangeNotifier } from "@/lib/notifications/notifier"
import type { PlannerStore } from "@/stores/plannerStore"

/** What commands read and write while being created, performed or undone */
export interface CommandContext {
  store: PlannerStore
  notifier: ChangeNotifier
}

/**
 * Events queued on the session event bus and delivered on flush.
 *
 * @module shared/constants/StorageEventEnums
 */
export enum StorageEventType {
  ITEMS_WITHDRAWN = "storage:items_withdrawn",
  ITEMS_DEPOSITED = "storage:items_deposited",
  QUICK_STACK_COMPLETED = "storage:quick_stack_completed",
  MEMBERSHIP_OVERRIDDEN = "storage:membership_overridden",
  MEMBERSHIP_RESTORED = "storage:membership_restored",
  CRAFT_STATE_CHANGED = "craft:state_changed",
  CRAFT_STEP_COMPLETED = "craft:step_completed",
  CRAFT_FINISHED = "craft:finished",
}

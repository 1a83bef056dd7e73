export type {
  MigrationReconciler,
  MigrationState,
  ReconcileAction,
  ReconcileResult,
} from './MigrationReconciler.js';
export {
  MigrationReconcilerImpl,
  type ExpectedSchema,
} from './MigrationReconcilerImpl.js';

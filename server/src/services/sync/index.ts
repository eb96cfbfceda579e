export { BatchScheduler, assertBatchSize } from './batchScheduler.js';
export type { ScheduleContext, ScheduleOptions } from './batchScheduler.js';
export { ReconciliationService } from './reconciliationService.js';
export type {
    ChangeSetPreview,
    ChangeSetPreviewEntry,
    ConnectionReport,
    ConnectionStatus,
    PreviewOptions,
    ReconciliationServiceOptions,
    RemoteListingExport,
} from './reconciliationService.js';

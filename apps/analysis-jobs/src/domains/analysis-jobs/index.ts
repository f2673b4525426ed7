export { createAnalysisJobsModule } from "./api"
export { type AnalysisJobServices, createAnalysisJobServices } from "./composition"
export type { AnalysisJob, JobId, JobKind, JobStatus } from "./model/job.model"

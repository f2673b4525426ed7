const JOBS_NS = "analysis:jobs"
const JOB_CLAIMS_NS = "analysis:jobs:claims"
const EXTERNAL_IDS_NS = "analysis:jobs:external"
const JOBS_INDEX_NS = "analysis:jobs:index"
const JOB_LOCKS_NS = "analysis:jobs:locks"

export function jobsKeyspace(prefix: string): string {
  return `${prefix}:${JOBS_NS}:`
}

export function jobClaimsKeyspace(prefix: string): string {
  return `${prefix}:${JOB_CLAIMS_NS}:`
}

export function externalIdsKeyspace(prefix: string): string {
  return `${prefix}:${EXTERNAL_IDS_NS}:`
}

export function jobsIndexKeyspace(prefix: string): string {
  return `${prefix}:${JOBS_INDEX_NS}:`
}

export function jobLocksKeyspace(prefix: string): string {
  return `${prefix}:${JOB_LOCKS_NS}:`
}

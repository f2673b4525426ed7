/**
 * Namespaced string key, e.g. "job:job_0190...", "claim:t1:csr_call:call-42".
 */
export type KvKey = string

import { createHash } from "node:crypto"
import type { KeyValueStore, KvVersion } from "@conduit/kv"
import { JobError } from "../model/job.errors"
import {
  type AnalysisJob,
  holdsNaturalKey,
  type JobId,
  naturalKeyOf,
  needsSupervision,
} from "../model/job.model"

export type JobClaim = {
  jobId: JobId
}

export type JobIndex = {
  jobIds: JobId[]
}

export type JobStoreDeps = {
  jobKv: KeyValueStore<AnalysisJob>
  claimKv: KeyValueStore<JobClaim>
  externalIdKv: KeyValueStore<JobClaim>
  indexKv: KeyValueStore<JobIndex>
}

export type JobStoreOptions = {
  maxRetries: number

  /** Compare-and-swap rounds before giving up on a contended key. */
  maxCasAttempts?: number

  /** Number of index documents the active job ids are spread over. */
  indexShards?: number

  /**
   * Compare-and-swap rounds on one index shard. Every round has a winner, so
   * up to this many concurrent writers on a shard all get through.
   */
  maxIndexAttempts?: number
}

export type VersionedJob = {
  job: AnalysisJob
  version: KvVersion
}

export type CreateJobResult =
  | { kind: "created"; job: AnalysisJob }
  | { kind: "existing"; job: AnalysisJob }

export type UpdateJobResult =
  | { kind: "updated"; job: AnalysisJob }
  | { kind: "unchanged"; job: AnalysisJob }
  | { kind: "not_found" }

const DEFAULT_MAX_CAS_ATTEMPTS = 8
const DEFAULT_INDEX_SHARDS = 16
const DEFAULT_MAX_INDEX_ATTEMPTS = 64

export class JobStore {
  private readonly maxCasAttempts: number
  private readonly maxIndexAttempts: number
  private readonly shardKeys: string[]

  public constructor(
    private readonly deps: JobStoreDeps,
    private readonly opts: JobStoreOptions,
  ) {
    this.maxCasAttempts = opts.maxCasAttempts ?? DEFAULT_MAX_CAS_ATTEMPTS
    this.maxIndexAttempts = opts.maxIndexAttempts ?? DEFAULT_MAX_INDEX_ATTEMPTS
    this.shardKeys = Array.from(
      { length: Math.max(1, opts.indexShards ?? DEFAULT_INDEX_SHARDS) },
      (_, n) => `active:${n}`,
    )
  }

  /** Tenant-scoped read. A job owned by another tenant reads as missing. */
  async get(tenantId: string, id: JobId): Promise<AnalysisJob | null> {
    const job = await this.load(id)

    return job && job.tenantId === tenantId ? job : null
  }

  async getVersioned(id: JobId): Promise<VersionedJob | null> {
    const res = await this.deps.jobKv.getVersioned(id)

    return res.kind === "found" ? { job: res.value, version: res.version } : null
  }

  async findByExternalId(externalJobId: string): Promise<AnalysisJob | null> {
    const link = await this.deps.externalIdKv.get(externalJobId)
    if (link.kind === "not_found") return null

    const job = await this.load(link.value.jobId)

    // Links from earlier attempts stay behind; only the current one counts.
    return job && job.externalJobId === externalJobId ? job : null
  }

  /**
   * Stores `job` unless another job already holds its natural key, in which
   * case that job is returned instead.
   *
   * @remarks
   * Order: record, index entry, claim. A claim never points at a missing or
   * unlisted job, and a failure before the claim leaves nothing behind that
   * blocks the next submission. A claim whose job no longer holds the key
   * (succeeded, or out of retries) is taken over with compare-and-swap.
   */
  async create(job: AnalysisJob): Promise<CreateJobResult> {
    const claimKey = naturalKeyOf(job)

    await this.deps.jobKv.set(job.id, job)

    try {
      await this.addToIndex(job.id)
    } catch (err) {
      await this.deps.jobKv.delete(job.id)
      throw err
    }

    for (let attempt = 0; attempt < this.maxCasAttempts; attempt++) {
      const claimed = await this.deps.claimKv.setIfNotExists(claimKey, { jobId: job.id })
      if (claimed.kind === "written") return { kind: "created", job }

      const current = await this.deps.claimKv.getVersioned(claimKey)
      if (current.kind === "not_found") continue

      const holder = await this.load(current.value.jobId)

      if (
        holder &&
        naturalKeyOf(holder) === claimKey &&
        holdsNaturalKey(holder, this.opts.maxRetries)
      ) {
        await this.discard(job.id)
        return { kind: "existing", job: holder }
      }

      const replaced = await this.deps.claimKv.setIfVersion(
        claimKey,
        { jobId: job.id },
        current.version,
      )
      if (replaced.kind === "written") return { kind: "created", job }
    }

    await this.discard(job.id)
    throw JobError.contention(claimKey)
  }

  /**
   * Writes `job` only if the record is still at `version`. A true result means
   * the write is committed; finished jobs leave the index through `listActive`.
   */
  async replace(job: AnalysisJob, version: KvVersion): Promise<boolean> {
    const res = await this.deps.jobKv.setIfVersion(job.id, job, version)

    return res.kind === "written"
  }

  /**
   * Read-modify-write with compare-and-swap. `fn` returns null to leave the
   * job as it is; it may run several times under contention.
   */
  async update(
    id: JobId,
    fn: (job: AnalysisJob) => AnalysisJob | null,
  ): Promise<UpdateJobResult> {
    for (let attempt = 0; attempt < this.maxCasAttempts; attempt++) {
      const current = await this.getVersioned(id)
      if (!current) return { kind: "not_found" }

      const next = fn(current.job)
      if (!next) return { kind: "unchanged", job: current.job }

      if (await this.replace(next, current.version)) {
        return { kind: "updated", job: next }
      }
    }

    throw JobError.contention(id)
  }

  async linkExternalId(externalJobId: string, jobId: JobId): Promise<void> {
    await this.deps.externalIdKv.set(externalJobId, { jobId })
  }

  /**
   * Jobs the poller and the supervisor still look at.
   *
   * @remarks
   * Entries whose record vanished, or whose job needs no more supervision, are
   * skipped and pruned from their shard. A pruning write that keeps losing is
   * left for the next call.
   */
  async listActive(): Promise<AnalysisJob[]> {
    const shards = await this.deps.indexKv.getMany(this.shardKeys)

    const ids: JobId[] = []
    for (const res of shards.values()) {
      if (res.kind === "found") ids.push(...res.value.jobIds)
    }

    const entries = await this.deps.jobKv.getMany(ids)

    const jobs: AnalysisJob[] = []
    const stale: JobId[] = []

    for (const id of ids) {
      const res = entries.get(id)

      if (res?.kind === "found" && needsSupervision(res.value)) {
        jobs.push(res.value)
      } else {
        stale.push(id)
      }
    }

    for (const id of stale) {
      await this.removeFromIndex(id)
    }

    return jobs
  }

  private async load(id: JobId): Promise<AnalysisJob | null> {
    const res = await this.deps.jobKv.get(id)

    return res.kind === "found" ? res.value : null
  }

  /** Drops a record that never got its claim, along with its index entry. */
  private async discard(id: JobId): Promise<void> {
    await this.deps.jobKv.delete(id)
    await this.removeFromIndex(id)
  }

  private async addToIndex(id: JobId): Promise<void> {
    const added = await this.updateShard(id, (ids) => (ids.includes(id) ? null : [...ids, id]))

    if (!added) throw JobError.contention(this.shardKeyOf(id))
  }

  /** A removal that loses every round leaves a stale entry, which `listActive` skips. */
  private async removeFromIndex(id: JobId): Promise<boolean> {
    return this.updateShard(id, (ids) => (ids.includes(id) ? ids.filter((x) => x !== id) : null))
  }

  private shardKeyOf(id: JobId): string {
    const n = createHash("sha256").update(id).digest().readUInt32BE(0) % this.shardKeys.length

    return this.shardKeys[n] ?? `active:${n}`
  }

  /** False when every compare-and-swap round lost. */
  private async updateShard(id: JobId, fn: (ids: JobId[]) => JobId[] | null): Promise<boolean> {
    const key = this.shardKeyOf(id)

    for (let attempt = 0; attempt < this.maxIndexAttempts; attempt++) {
      const current = await this.deps.indexKv.getVersioned(key)

      if (current.kind === "not_found") {
        const jobIds = fn([])
        if (!jobIds) return true

        const res = await this.deps.indexKv.setIfNotExists(key, { jobIds })
        if (res.kind === "written") return true
        continue
      }

      const jobIds = fn(current.value.jobIds)
      if (!jobIds) return true

      const res = await this.deps.indexKv.setIfVersion(key, { jobIds }, current.version)
      if (res.kind === "written") return true
    }

    return false
  }
}

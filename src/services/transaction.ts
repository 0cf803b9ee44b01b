/**
 * Project Unit of Work
 *
 * Work on one project runs under an in-process per-project lock. Reads go
 * through the transaction (pending writes are visible), writes are buffered
 * into a ChangeSet and committed in a single store call guarded by the
 * project's row_version. Nothing reaches the store if the work throws, times
 * out or is aborted before commit.
 */

import {
  Project,
  BomLineItem,
  DetectedComponent,
  DetectionMatchUpdate,
  MatchStatus
} from '../types';
import { NotFoundError, StoreTimeoutError } from '../errors';
import { EstimatorStore, ChangeSet, ProjectPatch, isEmptyChangeSet } from './store';
import { throwIfAborted, withTimeout } from './io';

export interface TransactionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

// ============================================================================
// PER-PROJECT LOCK
// ============================================================================

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.tails.size;
  }
}

const projectLocks = new KeyedLock();

// ============================================================================
// TRANSACTION
// ============================================================================

export class ProjectTransaction {
  private readonly bomUpserts = new Map<string, BomLineItem>();
  private readonly bomDeletes = new Set<string>();
  private readonly detectionUpdates = new Map<string, DetectionMatchUpdate>();
  private projectPatch: Omit<ProjectPatch, 'updated_date'> = {};
  private current: Project;

  constructor(
    private readonly store: EstimatorStore,
    readonly initial: Project,
    readonly signal: AbortSignal
  ) {
    this.current = { ...initial };
  }

  get projectId(): string {
    return this.initial.project_id;
  }

  /** Project as it will look after commit */
  get project(): Project {
    return { ...this.current };
  }

  get bomChanged(): boolean {
    return this.bomUpserts.size > 0 || this.bomDeletes.size > 0;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async listBomItems(): Promise<BomLineItem[]> {
    throwIfAborted(this.signal);
    const stored = await this.store.listBomItems(this.projectId, { signal: this.signal });
    const merged = new Map<string, BomLineItem>();
    for (const item of stored) {
      if (!this.bomDeletes.has(item.bom_id)) merged.set(item.bom_id, item);
    }
    for (const item of this.bomUpserts.values()) {
      merged.set(item.bom_id, { ...item });
    }
    return [...merged.values()].sort((a, b) => a.line_sequence - b.line_sequence);
  }

  async getBomItem(bomId: string): Promise<BomLineItem> {
    throwIfAborted(this.signal);
    if (this.bomDeletes.has(bomId)) {
      throw new NotFoundError('bom_item', bomId);
    }
    const pending = this.bomUpserts.get(bomId);
    if (pending) return { ...pending };

    const item = await this.store.getBomItem(bomId, { signal: this.signal });
    if (!item || item.project_id !== this.projectId) {
      throw new NotFoundError('bom_item', bomId);
    }
    return item;
  }

  async listDetections(status?: MatchStatus): Promise<DetectedComponent[]> {
    throwIfAborted(this.signal);
    const stored = await this.store.listDetections(this.projectId, undefined, { signal: this.signal });
    return stored
      .map(d => this.applyPendingDetection(d))
      .filter(d => !status || d.match_status === status);
  }

  async getDetection(detectionId: string): Promise<DetectedComponent> {
    throwIfAborted(this.signal);
    const detection = await this.store.getDetection(detectionId, { signal: this.signal });
    if (!detection || detection.project_id !== this.projectId) {
      throw new NotFoundError('detection', detectionId);
    }
    return this.applyPendingDetection(detection);
  }

  private applyPendingDetection(detection: DetectedComponent): DetectedComponent {
    const pending = this.detectionUpdates.get(detection.detection_id);
    return pending ? { ...detection, ...pending } : detection;
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /** Next line sequence for this project; numbers are never handed out twice */
  allocateSequence(): number {
    const next = this.current.last_line_sequence + 1;
    this.patchProject({ last_line_sequence: next });
    return next;
  }

  putBomItem(item: BomLineItem): void {
    this.bomDeletes.delete(item.bom_id);
    this.bomUpserts.set(item.bom_id, { ...item });
  }

  deleteBomItem(bomId: string): void {
    this.bomUpserts.delete(bomId);
    this.bomDeletes.add(bomId);
  }

  updateDetection(update: DetectionMatchUpdate): void {
    this.detectionUpdates.set(update.detection_id, { ...update });
  }

  patchProject(patch: Omit<ProjectPatch, 'updated_date'>): void {
    this.projectPatch = { ...this.projectPatch, ...patch };
    this.current = { ...this.current, ...patch };
  }

  changeSet(now: string = new Date().toISOString()): ChangeSet {
    return {
      bomUpserts: [...this.bomUpserts.values()].map(item => ({ ...item, updated_date: now })),
      bomDeletes: [...this.bomDeletes],
      detectionUpdates: [...this.detectionUpdates.values()],
      project: { ...this.projectPatch, updated_date: now }
    };
  }
}

// ============================================================================
// RUNNER
// ============================================================================

export interface TransactionResult<T> {
  result: T;
  project: Project;
  committed: boolean;
}

export async function runInProjectTransaction<T>(
  store: EstimatorStore,
  projectId: string,
  options: TransactionOptions,
  work: (tx: ProjectTransaction) => Promise<T>
): Promise<TransactionResult<T>> {
  return projectLocks.runExclusive(projectId, () => withTimeout(
    async signal => {
      const startTime = Date.now();
      const project = await store.getProject(projectId, { signal });
      if (!project) {
        throw new NotFoundError('project', projectId);
      }

      const tx = new ProjectTransaction(store, project, signal);
      const result = await work(tx);
      throwIfAborted(signal);

      const changes = tx.changeSet();
      if (isEmptyChangeSet(changes)) {
        return { result, project, committed: false };
      }

      const committed = await store.commit(projectId, project.row_version, changes, { signal });
      const duration = Date.now() - startTime;
      console.log(`💾 Committed project_id=${projectId} version=${committed.row_version} lines+=${changes.bomUpserts.length} lines-=${changes.bomDeletes.length} detections=${changes.detectionUpdates.length} duration=${duration}ms`);
      return { result, project: committed, committed: true };
    },
    options.timeoutMs,
    () => new StoreTimeoutError(`project transaction ${projectId}`, options.timeoutMs),
    options.signal
  ));
}

/**
 * Persistence contract for the estimator engine.
 *
 * Reads are plain queries. Everything that touches a project's BOM, detections
 * or cached totals is committed as one ChangeSet, guarded by the project's
 * row_version, so a line item and its rollup land together or not at all.
 */

import {
  Project,
  ProjectStatus,
  ProjectTotals,
  NewProjectInput,
  ComponentCatalogEntry,
  BomLineItem,
  DetectedComponent,
  DetectionMatchUpdate,
  MatchStatus,
  RawDetection
} from '../types';

export interface IoOptions {
  signal?: AbortSignal;
}

export interface CatalogFilter {
  itclass?: string;
  /** Case-insensitive substring of itemname, manufacturer or model_number */
  search?: string;
  /** Defaults to true */
  activeOnly?: boolean;
}

export interface ProjectPatch extends Partial<ProjectTotals> {
  status?: ProjectStatus;
  labor_rate_per_hour?: number | null;
  default_markup_pct?: number | null;
  last_line_sequence?: number;
  updated_date: string;
}

export interface ChangeSet {
  bomUpserts: BomLineItem[];
  bomDeletes: string[];
  detectionUpdates: DetectionMatchUpdate[];
  project: ProjectPatch;
}

export interface EstimatorStore {
  readonly kind: 'supabase' | 'memory';

  /** Startup check: true when the component catalog can be queried */
  ping(options?: IoOptions): Promise<boolean>;

  // Catalog (read-only)
  listCatalogEntries(filter?: CatalogFilter, options?: IoOptions): Promise<ComponentCatalogEntry[]>;
  getCatalogEntry(componentId: string, options?: IoOptions): Promise<ComponentCatalogEntry | null>;

  // Projects
  createProject(input: NewProjectInput, options?: IoOptions): Promise<Project>;
  getProject(projectId: string, options?: IoOptions): Promise<Project | null>;
  getProjectByCode(projectCode: string, options?: IoOptions): Promise<Project | null>;
  listProjects(status?: ProjectStatus, options?: IoOptions): Promise<Project[]>;

  // BOM
  listBomItems(projectId: string, options?: IoOptions): Promise<BomLineItem[]>;
  getBomItem(bomId: string, options?: IoOptions): Promise<BomLineItem | null>;

  // Detections
  insertDetections(projectId: string, detections: RawDetection[], options?: IoOptions): Promise<DetectedComponent[]>;
  listDetections(projectId: string, status?: MatchStatus, options?: IoOptions): Promise<DetectedComponent[]>;
  getDetection(detectionId: string, options?: IoOptions): Promise<DetectedComponent | null>;

  /**
   * Apply a change set atomically. Rejects with ConcurrencyConflictError when the
   * project's row_version no longer equals expectedVersion; on success the
   * version is incremented and the updated project returned.
   */
  commit(projectId: string, expectedVersion: number, changes: ChangeSet, options?: IoOptions): Promise<Project>;
}

export function isEmptyChangeSet(changes: ChangeSet): boolean {
  const { updated_date: _updated, ...projectFields } = changes.project;
  return changes.bomUpserts.length === 0 &&
    changes.bomDeletes.length === 0 &&
    changes.detectionUpdates.length === 0 &&
    Object.keys(projectFields).length === 0;
}

/**
 * In-process EstimatorStore
 * Used when Supabase is not configured, and by the test suite
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Project,
  ProjectStatus,
  NewProjectInput,
  ComponentCatalogEntry,
  BomLineItem,
  DetectedComponent,
  MatchStatus,
  RawDetection,
  EMPTY_TOTALS
} from '../types';
import { ConcurrencyConflictError, NotFoundError, ValidationError } from '../errors';
import { EstimatorStore, CatalogFilter, ChangeSet, IoOptions } from './store';
import { throwIfAborted } from './io';

export class MemoryStore implements EstimatorStore {
  readonly kind = 'memory' as const;

  private catalog = new Map<string, ComponentCatalogEntry>();
  private projects = new Map<string, Project>();
  private bomItems = new Map<string, BomLineItem>();
  private detections = new Map<string, DetectedComponent>();

  constructor(catalog: ComponentCatalogEntry[] = []) {
    this.seedCatalog(catalog);
  }

  seedCatalog(entries: ComponentCatalogEntry[]): void {
    for (const entry of entries) {
      this.catalog.set(entry.component_id, { ...entry });
    }
  }

  async ping(options: IoOptions = {}): Promise<boolean> {
    throwIfAborted(options.signal);
    return true;
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  async listCatalogEntries(filter: CatalogFilter = {}, options: IoOptions = {}): Promise<ComponentCatalogEntry[]> {
    throwIfAborted(options.signal);
    const activeOnly = filter.activeOnly ?? true;
    const itclass = filter.itclass?.toUpperCase();
    const search = filter.search?.toLowerCase();

    return [...this.catalog.values()]
      .filter(entry => !activeOnly || entry.is_active)
      .filter(entry => !itclass || entry.itclass.toUpperCase() === itclass)
      .filter(entry => !search || [entry.itemname, entry.manufacturer, entry.model_number]
        .some(field => field?.toLowerCase().includes(search)))
      .sort((a, b) => a.itemname.localeCompare(b.itemname))
      .map(entry => ({ ...entry }));
  }

  async getCatalogEntry(componentId: string, options: IoOptions = {}): Promise<ComponentCatalogEntry | null> {
    throwIfAborted(options.signal);
    const entry = this.catalog.get(componentId);
    return entry ? { ...entry } : null;
  }

  // ==========================================================================
  // Projects
  // ==========================================================================

  async createProject(input: NewProjectInput, options: IoOptions = {}): Promise<Project> {
    throwIfAborted(options.signal);
    const existing = await this.getProjectByCode(input.project_code);
    if (existing) {
      throw new ValidationError(`Project code already exists: ${input.project_code}`, 'INVALID_PROJECT_CODE', 'project_code');
    }

    const now = new Date().toISOString();
    const project: Project = {
      project_id: uuidv4(),
      project_code: input.project_code,
      project_name: input.project_name || `Project ${input.project_code}`,
      client_name: input.client_name ?? null,
      status: input.status ?? 'draft',
      created_date: now,
      updated_date: now,
      created_by: input.created_by || 'system',
      labor_rate_per_hour: input.labor_rate_per_hour ?? null,
      default_markup_pct: input.default_markup_pct ?? null,
      last_line_sequence: 0,
      row_version: 0,
      ...EMPTY_TOTALS
    };

    this.projects.set(project.project_id, project);
    return { ...project };
  }

  async getProject(projectId: string, options: IoOptions = {}): Promise<Project | null> {
    throwIfAborted(options.signal);
    const project = this.projects.get(projectId);
    return project ? { ...project } : null;
  }

  async getProjectByCode(projectCode: string, options: IoOptions = {}): Promise<Project | null> {
    throwIfAborted(options.signal);
    for (const project of this.projects.values()) {
      if (project.project_code === projectCode) return { ...project };
    }
    return null;
  }

  async listProjects(status?: ProjectStatus, options: IoOptions = {}): Promise<Project[]> {
    throwIfAborted(options.signal);
    return [...this.projects.values()]
      .filter(project => !status || project.status === status)
      .sort((a, b) => b.created_date.localeCompare(a.created_date))
      .map(project => ({ ...project }));
  }

  // ==========================================================================
  // BOM
  // ==========================================================================

  async listBomItems(projectId: string, options: IoOptions = {}): Promise<BomLineItem[]> {
    throwIfAborted(options.signal);
    return [...this.bomItems.values()]
      .filter(item => item.project_id === projectId)
      .sort((a, b) => a.line_sequence - b.line_sequence)
      .map(item => ({ ...item }));
  }

  async getBomItem(bomId: string, options: IoOptions = {}): Promise<BomLineItem | null> {
    throwIfAborted(options.signal);
    const item = this.bomItems.get(bomId);
    return item ? { ...item } : null;
  }

  // ==========================================================================
  // Detections
  // ==========================================================================

  async insertDetections(projectId: string, raw: RawDetection[], options: IoOptions = {}): Promise<DetectedComponent[]> {
    throwIfAborted(options.signal);
    if (!this.projects.has(projectId)) {
      throw new NotFoundError('project', projectId);
    }

    const now = new Date().toISOString();
    const created = raw.map((item): DetectedComponent => ({
      detection_id: uuidv4(),
      project_id: projectId,
      itemname: item.itemname,
      itemdesc: item.itemdesc ?? null,
      itdesc2: item.itdesc2 ?? null,
      itdesc3: item.itdesc3 ?? null,
      itdesc4: item.itdesc4 ?? null,
      itclass: item.itclass ?? null,
      manufacturer: item.manufacturer ?? null,
      model_number: item.model_number ?? null,
      rating: item.rating ?? null,
      qty: item.qty ?? 1,
      notes: item.notes ?? '',
      confidence_level: item.confidence_level ?? null,
      location_on_drawing: item.location_on_drawing ?? null,
      matched_component_id: null,
      match_status: 'new',
      match_score: null,
      match_method: null,
      rejection_reason: null,
      matched_date: null,
      created_date: now
    }));

    for (const detection of created) {
      this.detections.set(detection.detection_id, detection);
    }
    return created.map(detection => ({ ...detection }));
  }

  async listDetections(projectId: string, status?: MatchStatus, options: IoOptions = {}): Promise<DetectedComponent[]> {
    throwIfAborted(options.signal);
    return [...this.detections.values()]
      .filter(d => d.project_id === projectId)
      .filter(d => !status || d.match_status === status)
      .sort((a, b) => a.created_date.localeCompare(b.created_date))
      .map(d => ({ ...d }));
  }

  async getDetection(detectionId: string, options: IoOptions = {}): Promise<DetectedComponent | null> {
    throwIfAborted(options.signal);
    const detection = this.detections.get(detectionId);
    return detection ? { ...detection } : null;
  }

  // ==========================================================================
  // Commit
  // ==========================================================================

  async commit(projectId: string, expectedVersion: number, changes: ChangeSet, options: IoOptions = {}): Promise<Project> {
    throwIfAborted(options.signal);

    const project = this.projects.get(projectId);
    if (!project) {
      throw new NotFoundError('project', projectId);
    }
    if (project.row_version !== expectedVersion) {
      throw new ConcurrencyConflictError(projectId);
    }

    // Validate the whole change set before mutating anything
    const deleted = new Set(changes.bomDeletes);
    const sequences = new Map<number, string>();
    for (const item of this.bomItems.values()) {
      if (item.project_id === projectId && !deleted.has(item.bom_id)) {
        sequences.set(item.line_sequence, item.bom_id);
      }
    }
    for (const item of changes.bomUpserts) {
      if (item.project_id !== projectId) {
        throw new ValidationError(`BOM item ${item.bom_id} belongs to another project`);
      }
      const holder = sequences.get(item.line_sequence);
      if (holder && holder !== item.bom_id) {
        throw new ConcurrencyConflictError(projectId);
      }
      sequences.set(item.line_sequence, item.bom_id);
    }
    for (const update of changes.detectionUpdates) {
      const detection = this.detections.get(update.detection_id);
      if (!detection || detection.project_id !== projectId) {
        throw new NotFoundError('detection', update.detection_id);
      }
    }

    for (const bomId of changes.bomDeletes) {
      this.bomItems.delete(bomId);
    }
    for (const item of changes.bomUpserts) {
      this.bomItems.set(item.bom_id, { ...item });
    }
    for (const update of changes.detectionUpdates) {
      const detection = this.detections.get(update.detection_id);
      if (detection) {
        this.detections.set(update.detection_id, { ...detection, ...update });
      }
    }

    const next: Project = {
      ...project,
      ...changes.project,
      row_version: project.row_version + 1
    };
    this.projects.set(projectId, next);
    return { ...next };
  }
}

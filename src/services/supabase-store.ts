/**
 * Supabase-backed EstimatorStore
 * Reads go through PostgREST; change sets are committed by the
 * estimator_commit_changes function (sql/002_commit_changes.sql) in one transaction.
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  Project,
  ProjectStatus,
  NewProjectInput,
  ComponentCatalogEntry,
  BomLineItem,
  DetectedComponent,
  MatchStatus,
  RawDetection
} from '../types';
import {
  ConcurrencyConflictError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError
} from '../errors';
import { CatalogRowSchema, ProjectRowSchema, BomRowSchema, DetectionRowSchema } from '../schemas/rows';
import { EstimatorStore, CatalogFilter, ChangeSet, IoOptions } from './store';

interface DbError {
  message: string;
  code: string;
}

interface QueryResult {
  data: unknown;
  error: DbError | null;
}

// SQLSTATE codes raised by Postgres / the commit function
const SERIALIZATION_FAILURE = '40001';
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';
const NO_DATA_FOUND = 'P0002';

const NEVER_ABORTED = new AbortController().signal;

export function mapStoreError(operation: string, error: DbError, projectId?: string): Error {
  switch (error.code) {
    case SERIALIZATION_FAILURE:
    case UNIQUE_VIOLATION:
      return new ConcurrencyConflictError(projectId ?? 'unknown');
    case NO_DATA_FOUND:
    case FOREIGN_KEY_VIOLATION:
      return new NotFoundError('project', projectId ?? 'unknown');
    default:
      console.error(`❌ Store error (${operation}):`, error.message);
      return new StoreUnavailableError(`${operation}: ${error.message}`);
  }
}

export class SupabaseStore implements EstimatorStore {
  readonly kind = 'supabase' as const;

  constructor(private readonly client: SupabaseClient) {}

  private async execute(operation: string, query: PromiseLike<QueryResult>, projectId?: string): Promise<unknown> {
    let result: QueryResult;
    try {
      result = await query;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new StoreUnavailableError(`${operation}: ${detail}`);
    }
    if (result.error) {
      throw mapStoreError(operation, result.error, projectId);
    }
    return result.data;
  }

  async ping(options: IoOptions = {}): Promise<boolean> {
    try {
      const { error } = await this.client
        .from('component_library')
        .select('component_id')
        .limit(1)
        .abortSignal(options.signal ?? NEVER_ABORTED);
      if (error) {
        console.error('❌ Database connection check failed:', error.message);
      }
      return !error;
    } catch (err) {
      console.error('❌ Database connection error:', err);
      return false;
    }
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  async listCatalogEntries(filter: CatalogFilter = {}, options: IoOptions = {}): Promise<ComponentCatalogEntry[]> {
    let query = this.client
      .from('component_library')
      .select('*')
      .order('itemname')
      .abortSignal(options.signal ?? NEVER_ABORTED);

    if (filter.activeOnly ?? true) {
      query = query.eq('is_active', true);
    }
    if (filter.itclass) {
      query = query.eq('itclass', filter.itclass.toUpperCase());
    }
    if (filter.search) {
      // commas and parentheses would split the or() expression
      const term = filter.search.replace(/[,()*%]/g, ' ').trim();
      query = query.or(`itemname.ilike.%${term}%,manufacturer.ilike.%${term}%,model_number.ilike.%${term}%`);
    }

    const data = await this.execute('listCatalogEntries', query);
    return z.array(CatalogRowSchema).parse(data ?? []);
  }

  async getCatalogEntry(componentId: string, options: IoOptions = {}): Promise<ComponentCatalogEntry | null> {
    const data = await this.execute('getCatalogEntry', this.client
      .from('component_library')
      .select('*')
      .eq('component_id', componentId)
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .maybeSingle());
    return data ? CatalogRowSchema.parse(data) : null;
  }

  // ==========================================================================
  // Projects
  // ==========================================================================

  async createProject(input: NewProjectInput, options: IoOptions = {}): Promise<Project> {
    const result = await this.client
      .from('projects')
      .insert({
        project_code: input.project_code,
        project_name: input.project_name || `Project ${input.project_code}`,
        client_name: input.client_name ?? null,
        status: input.status ?? 'draft',
        created_by: input.created_by || 'system',
        labor_rate_per_hour: input.labor_rate_per_hour ?? null,
        default_markup_pct: input.default_markup_pct ?? null
      })
      .select('*')
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .single();

    if (result.error?.code === UNIQUE_VIOLATION) {
      throw new ValidationError(`Project code already exists: ${input.project_code}`, 'INVALID_PROJECT_CODE', 'project_code');
    }
    const data = await this.execute('createProject', Promise.resolve(result));
    return ProjectRowSchema.parse(data);
  }

  async getProject(projectId: string, options: IoOptions = {}): Promise<Project | null> {
    const data = await this.execute('getProject', this.client
      .from('projects')
      .select('*')
      .eq('project_id', projectId)
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .maybeSingle(), projectId);
    return data ? ProjectRowSchema.parse(data) : null;
  }

  async getProjectByCode(projectCode: string, options: IoOptions = {}): Promise<Project | null> {
    const data = await this.execute('getProjectByCode', this.client
      .from('projects')
      .select('*')
      .eq('project_code', projectCode)
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .maybeSingle());
    return data ? ProjectRowSchema.parse(data) : null;
  }

  async listProjects(status?: ProjectStatus, options: IoOptions = {}): Promise<Project[]> {
    let query = this.client
      .from('projects')
      .select('*')
      .order('created_date', { ascending: false })
      .abortSignal(options.signal ?? NEVER_ABORTED);

    if (status) {
      query = query.eq('status', status);
    }

    const data = await this.execute('listProjects', query);
    return z.array(ProjectRowSchema).parse(data ?? []);
  }

  // ==========================================================================
  // BOM
  // ==========================================================================

  async listBomItems(projectId: string, options: IoOptions = {}): Promise<BomLineItem[]> {
    const data = await this.execute('listBomItems', this.client
      .from('bom_items')
      .select('*')
      .eq('project_id', projectId)
      .order('line_sequence')
      .abortSignal(options.signal ?? NEVER_ABORTED), projectId);
    return z.array(BomRowSchema).parse(data ?? []);
  }

  async getBomItem(bomId: string, options: IoOptions = {}): Promise<BomLineItem | null> {
    const data = await this.execute('getBomItem', this.client
      .from('bom_items')
      .select('*')
      .eq('bom_id', bomId)
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .maybeSingle());
    return data ? BomRowSchema.parse(data) : null;
  }

  // ==========================================================================
  // Detections
  // ==========================================================================

  async insertDetections(projectId: string, detections: RawDetection[], options: IoOptions = {}): Promise<DetectedComponent[]> {
    const rows = detections.map(d => ({
      project_id: projectId,
      itemname: d.itemname,
      itemdesc: d.itemdesc ?? null,
      itdesc2: d.itdesc2 ?? null,
      itdesc3: d.itdesc3 ?? null,
      itdesc4: d.itdesc4 ?? null,
      itclass: d.itclass ?? null,
      manufacturer: d.manufacturer ?? null,
      model_number: d.model_number ?? null,
      rating: d.rating ?? null,
      qty: d.qty ?? 1,
      notes: d.notes ?? '',
      confidence_level: d.confidence_level ?? null,
      location_on_drawing: d.location_on_drawing ?? null,
      match_status: 'new'
    }));

    const data = await this.execute('insertDetections', this.client
      .from('detected_components')
      .insert(rows)
      .select('*')
      .abortSignal(options.signal ?? NEVER_ABORTED), projectId);
    return z.array(DetectionRowSchema).parse(data ?? []);
  }

  async listDetections(projectId: string, status?: MatchStatus, options: IoOptions = {}): Promise<DetectedComponent[]> {
    let query = this.client
      .from('detected_components')
      .select('*')
      .eq('project_id', projectId)
      .order('created_date')
      .order('detection_id')
      .abortSignal(options.signal ?? NEVER_ABORTED);

    if (status) {
      query = query.eq('match_status', status);
    }

    const data = await this.execute('listDetections', query, projectId);
    return z.array(DetectionRowSchema).parse(data ?? []);
  }

  async getDetection(detectionId: string, options: IoOptions = {}): Promise<DetectedComponent | null> {
    const data = await this.execute('getDetection', this.client
      .from('detected_components')
      .select('*')
      .eq('detection_id', detectionId)
      .abortSignal(options.signal ?? NEVER_ABORTED)
      .maybeSingle());
    return data ? DetectionRowSchema.parse(data) : null;
  }

  // ==========================================================================
  // Commit
  // ==========================================================================

  async commit(projectId: string, expectedVersion: number, changes: ChangeSet, options: IoOptions = {}): Promise<Project> {
    const data = await this.execute('commit', this.client
      .rpc('estimator_commit_changes', {
        p_project_id: projectId,
        p_expected_version: expectedVersion,
        p_changes: changes
      })
      .abortSignal(options.signal ?? NEVER_ABORTED), projectId);
    return ProjectRowSchema.parse(data);
  }
}

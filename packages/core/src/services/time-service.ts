/**
 * Time tracking (v2 team-level time entries).
 */

import { ValidationError } from '../client/errors.js';
import type {
  CreateTimeEntryRequest,
  RenameTimeEntryTagRequest,
  StartTimerRequest,
  TimeEntriesResponse,
  TimeEntryHistoryResponse,
  TimeEntryResponse,
  TimeEntryTagsRequest,
  TimeEntryTagsResponse,
  UpdateTimeEntryRequest,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

function requireTagChange(request: TimeEntryTagsRequest): TimeEntryTagsRequest {
  const ids = request.time_entry_ids.map((id) => id.trim()).filter((id) => id !== '');
  const tags = request.tags.filter((tag) => tag.name.trim() !== '');
  if (ids.length === 0) {
    throw new ValidationError('at least one time entry ID is required');
  }
  if (tags.length === 0) {
    throw new ValidationError('at least one tag is required');
  }
  return { time_entry_ids: ids, tags };
}

export class TimeService extends Service {
  async list(teamId: string, taskId?: string): Promise<TimeEntriesResponse> {
    const id = requireId(teamId, 'team ID');
    const path = `/v2/team/${segment(id)}/time_entries` + query({ task_id: taskId?.trim() || undefined });
    return labelled('list time entries', () => this.api.get<TimeEntriesResponse>(path));
  }

  /**
   * Record a finished entry. `durationMs` must be positive; `start` is epoch
   * milliseconds.
   */
  async log(teamId: string, request: CreateTimeEntryRequest): Promise<TimeEntryResponse> {
    const id = requireId(teamId, 'team ID');
    if (!Number.isFinite(request.duration) || request.duration <= 0) {
      throw new ValidationError('duration must be a positive number of milliseconds');
    }
    return labelled('log time entry', () =>
      this.api.post<TimeEntryResponse>(`/v2/team/${segment(id)}/time_entries`, request)
    );
  }

  async get(teamId: string, entryId: string): Promise<TimeEntryResponse> {
    const team = requireId(teamId, 'team ID');
    const entry = requireId(entryId, 'time entry ID');
    return labelled('get time entry', () =>
      this.api.get<TimeEntryResponse>(`/v2/team/${segment(team)}/time_entries/${segment(entry)}`)
    );
  }

  /** The running timer, if any (`data` is null when none is running). */
  async current(teamId: string): Promise<TimeEntryResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('get running time entry', () =>
      this.api.get<TimeEntryResponse>(`/v2/team/${segment(id)}/time_entries/current`)
    );
  }

  async start(teamId: string, request: StartTimerRequest): Promise<TimeEntryResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('start timer', () =>
      this.api.post<TimeEntryResponse>(`/v2/team/${segment(id)}/time_entries/start`, request)
    );
  }

  async stop(teamId: string): Promise<TimeEntryResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('stop timer', () =>
      this.api.post<TimeEntryResponse>(`/v2/team/${segment(id)}/time_entries/stop`, undefined)
    );
  }

  async delete(teamId: string, entryId: string): Promise<void> {
    const team = requireId(teamId, 'team ID');
    const entry = requireId(entryId, 'time entry ID');
    return labelled('delete time entry', () =>
      this.api.delete(`/v2/team/${segment(team)}/time_entries/${segment(entry)}`)
    );
  }

  async update(teamId: string, entryId: string, request: UpdateTimeEntryRequest): Promise<TimeEntryResponse> {
    const team = requireId(teamId, 'team ID');
    const entry = requireId(entryId, 'time entry ID');
    return labelled('update time entry', () =>
      this.api.put<TimeEntryResponse>(`/v2/team/${segment(team)}/time_entries/${segment(entry)}`, request)
    );
  }

  async history(teamId: string, entryId: string): Promise<TimeEntryHistoryResponse> {
    const team = requireId(teamId, 'team ID');
    const entry = requireId(entryId, 'time entry ID');
    return labelled('get time entry history', () =>
      this.api.get<TimeEntryHistoryResponse>(`/v2/team/${segment(team)}/time_entries/${segment(entry)}/history`)
    );
  }

  /** Every tag used on time entries in the workspace. */
  async listTags(teamId: string): Promise<TimeEntryTagsResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('list time entry tags', () =>
      this.api.get<TimeEntryTagsResponse>(`/v2/team/${segment(id)}/time_entries/tags`)
    );
  }

  async addTags(teamId: string, request: TimeEntryTagsRequest): Promise<void> {
    const id = requireId(teamId, 'team ID');
    const body = requireTagChange(request);
    return labelled('add time entry tags', () =>
      this.api.exec('POST', `/v2/team/${segment(id)}/time_entries/tags`, body)
    );
  }

  async removeTags(teamId: string, request: TimeEntryTagsRequest): Promise<void> {
    const id = requireId(teamId, 'team ID');
    const body = requireTagChange(request);
    return labelled('remove time entry tags', () =>
      this.api.exec('DELETE', `/v2/team/${segment(id)}/time_entries/tags`, body)
    );
  }

  /** Rename a tag on every time entry that carries it. */
  async renameTag(teamId: string, request: RenameTimeEntryTagRequest): Promise<void> {
    const id = requireId(teamId, 'team ID');
    requireText(request.name, 'tag name');
    requireText(request.new_name, 'new tag name');
    return labelled('rename time entry tag', () =>
      this.api.exec('PUT', `/v2/team/${segment(id)}/time_entries/tags`, request)
    );
  }
}

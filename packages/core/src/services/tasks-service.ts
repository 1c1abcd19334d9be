/**
 * Tasks API (v2, plus the v3 home-list move).
 */

import { ValidationError } from '../client/errors.js';
import type {
  BulkTimeInStatusResponse,
  CreateFromTemplateRequest,
  CreateTaskRequest,
  ListTasksParams,
  MoveTaskResponse,
  SearchTasksParams,
  Task,
  TasksResponse,
  TimeInStatusResponse,
  UpdateTaskRequest,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

export class TasksService extends Service {
  /**
   * Tasks in a list. Closed tasks are included unless `includeClosed` is false.
   */
  async list(listId: string, params: ListTasksParams = {}): Promise<TasksResponse> {
    const id = requireId(listId, 'list ID');
    const path =
      `/v2/list/${segment(id)}/task` +
      query({
        include_closed: params.includeClosed ?? true,
        page: params.page,
        'statuses[]': params.status ? [params.status] : undefined,
        'assignees[]': params.assignee ? [params.assignee] : undefined,
      });

    return labelled('list tasks', () => this.api.get<TasksResponse>(path));
  }

  async get(taskId: string): Promise<Task> {
    const id = requireId(taskId, 'task ID');
    return labelled('get task', () => this.api.get<Task>(`/v2/task/${segment(id)}`));
  }

  async create(listId: string, request: CreateTaskRequest): Promise<Task> {
    const id = requireId(listId, 'list ID');
    requireText(request.name, 'name');
    return labelled('create task', () => this.api.post<Task>(`/v2/list/${segment(id)}/task`, request));
  }

  async update(taskId: string, request: UpdateTaskRequest): Promise<Task> {
    const id = requireId(taskId, 'task ID');
    return labelled('update task', () => this.api.put<Task>(`/v2/task/${segment(id)}`, request));
  }

  async delete(taskId: string): Promise<void> {
    const id = requireId(taskId, 'task ID');
    return labelled('delete task', () => this.api.delete(`/v2/task/${segment(id)}`));
  }

  /**
   * Filtered tasks across a whole workspace.
   */
  async search(teamId: string, params: SearchTasksParams = {}): Promise<TasksResponse> {
    const id = requireId(teamId, 'team ID');
    const path =
      `/v2/team/${segment(id)}/task` +
      query({
        page: params.page,
        order_by: params.orderBy,
        reverse: params.reverse,
        subtasks: params.subtasks,
        include_closed: params.includeClosed,
        'statuses[]': params.statuses,
        'assignees[]': params.assignees,
        'tags[]': params.tags,
        due_date_gt: params.dueDateGt,
        due_date_lt: params.dueDateLt,
      });

    return labelled('search tasks', () => this.api.get<TasksResponse>(path));
  }

  async timeInStatus(taskId: string): Promise<TimeInStatusResponse> {
    const id = requireId(taskId, 'task ID');
    return labelled('get time in status', () =>
      this.api.get<TimeInStatusResponse>(`/v2/task/${segment(id)}/time_in_status`)
    );
  }

  /** Time in status for several tasks in one request. */
  async bulkTimeInStatus(taskIds: string[]): Promise<BulkTimeInStatusResponse> {
    const ids = taskIds.map((id) => id.trim()).filter((id) => id !== '');
    if (ids.length === 0) {
      throw new ValidationError('at least one task ID is required');
    }

    const path = '/v2/task/bulk_time_in_status/task_ids' + query({ task_ids: ids });
    return labelled('get bulk time in status', () => this.api.get<BulkTimeInStatusResponse>(path));
  }

  /**
   * Create a task in `listId` from a task template. An empty name keeps the
   * template's own.
   */
  async createFromTemplate(listId: string, templateId: string, name?: string): Promise<Task> {
    const list = requireId(listId, 'list ID');
    const template = requireId(templateId, 'template ID');
    const request: Partial<CreateFromTemplateRequest> = name?.trim() ? { name } : {};

    return labelled('create task from template', () =>
      this.api.post<Task>(`/v2/list/${segment(list)}/taskTemplate/${segment(template)}`, request)
    );
  }

  /**
   * Merge `sourceTaskIds` into `targetTaskId`.
   */
  async merge(targetTaskId: string, sourceTaskIds: string[]): Promise<Task> {
    const id = requireId(targetTaskId, 'target task ID');
    const sources = sourceTaskIds.map((source) => source.trim()).filter((source) => source !== '');
    if (sources.length === 0) {
      throw new ValidationError('at least one source task ID is required');
    }

    return labelled('merge tasks', () =>
      this.api.post<Task>(`/v2/task/${segment(id)}/merge`, { source_task_ids: sources })
    );
  }

  async move(taskId: string, listId: string): Promise<MoveTaskResponse> {
    const task = requireId(taskId, 'task ID');
    const list = requireId(listId, 'list ID');
    const path = this.host.v3Path(`/tasks/${segment(task)}/home_list/${segment(list)}`);

    return labelled('move task', () => this.api.put<MoveTaskResponse>(path, undefined));
  }
}

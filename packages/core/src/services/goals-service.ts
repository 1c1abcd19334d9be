import type { CreateGoalRequest, GoalResponse, GoalsResponse, UpdateGoalRequest } from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

export class GoalsService extends Service {
  async list(teamId: string, includeCompleted: boolean = false): Promise<GoalsResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('list goals', () =>
      this.api.get<GoalsResponse>(`/v2/team/${segment(id)}/goal` + query({ include_completed: includeCompleted }))
    );
  }

  async get(goalId: string): Promise<GoalResponse> {
    const id = requireId(goalId, 'goal ID');
    return labelled('get goal', () => this.api.get<GoalResponse>(`/v2/goal/${segment(id)}`));
  }

  async create(teamId: string, request: CreateGoalRequest): Promise<GoalResponse> {
    const id = requireId(teamId, 'team ID');
    requireText(request.name, 'name');
    return labelled('create goal', () => this.api.post<GoalResponse>(`/v2/team/${segment(id)}/goal`, request));
  }

  async update(goalId: string, request: UpdateGoalRequest): Promise<GoalResponse> {
    const id = requireId(goalId, 'goal ID');
    return labelled('update goal', () => this.api.put<GoalResponse>(`/v2/goal/${segment(id)}`, request));
  }

  async delete(goalId: string): Promise<void> {
    const id = requireId(goalId, 'goal ID');
    return labelled('delete goal', () => this.api.delete(`/v2/goal/${segment(id)}`));
  }
}

import type {
  Member,
  MembersResponse,
  TeamResponse,
  WorkspacePlanResponse,
  WorkspaceSeatsResponse,
  WorkspacesResponse,
} from '../types.js';
import { Service, labelled, requireId, segment } from './service-helpers.js';

export class WorkspacesService extends Service {
  /** Workspaces ("teams" in v2) the key can see. */
  async list(): Promise<WorkspacesResponse> {
    return labelled('list workspaces', () => this.api.get<WorkspacesResponse>('/v2/team'));
  }

  async plan(teamId: string): Promise<WorkspacePlanResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('get workspace plan', () =>
      this.api.get<WorkspacePlanResponse>(`/v2/team/${segment(id)}/plan`)
    );
  }

  async seats(teamId: string): Promise<WorkspaceSeatsResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('get workspace seats', () =>
      this.api.get<WorkspaceSeatsResponse>(`/v2/team/${segment(id)}/seats`)
    );
  }
}

export class MembersService extends Service {
  /** Every member of the workspace, read from the team record. */
  async list(teamId: string): Promise<Member[]> {
    const id = requireId(teamId, 'team ID');
    const response = await labelled('list members', () => this.api.get<TeamResponse>(`/v2/team/${segment(id)}`));
    return response.team.members ?? [];
  }

  async listForTask(taskId: string): Promise<MembersResponse> {
    const id = requireId(taskId, 'task ID');
    return labelled('list task members', () => this.api.get<MembersResponse>(`/v2/task/${segment(id)}/member`));
  }

  async listForList(listId: string): Promise<MembersResponse> {
    const id = requireId(listId, 'list ID');
    return labelled('list list members', () => this.api.get<MembersResponse>(`/v2/list/${segment(id)}/member`));
  }
}

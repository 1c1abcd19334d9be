/**
 * User groups and custom roles: workspace-level access management.
 */

import { ValidationError } from '../client/errors.js';
import type {
  CreateUserGroupRequest,
  CustomRolesResponse,
  UpdateUserGroupRequest,
  UserGroup,
  UserGroupsResponse,
} from '../types.js';
import { Service, labelled, requireId, requireText, segment } from './service-helpers.js';

export class UserGroupsService extends Service {
  /** Groups in every workspace the key can see. */
  async list(): Promise<UserGroupsResponse> {
    return labelled('list user groups', () => this.api.get<UserGroupsResponse>('/v2/group'));
  }

  async create(teamId: string, request: CreateUserGroupRequest): Promise<UserGroup> {
    const id = requireId(teamId, 'team ID');
    requireText(request.name, 'name');
    return labelled('create user group', () =>
      this.api.post<UserGroup>(`/v2/team/${segment(id)}/group`, request)
    );
  }

  /**
   * Rename a group or change its membership. Members are added and removed by
   * user ID; anything left out stays as it is.
   */
  async update(groupId: string, request: UpdateUserGroupRequest): Promise<UserGroup> {
    const id = requireId(groupId, 'group ID');
    const members = request.members;
    const changesMembers = (members?.add?.length ?? 0) > 0 || (members?.rem?.length ?? 0) > 0;
    if (request.name === undefined && !changesMembers) {
      throw new ValidationError('nothing to update: set a name or members to add or remove');
    }
    return labelled('update user group', () => this.api.put<UserGroup>(`/v2/group/${segment(id)}`, request));
  }

  async delete(groupId: string): Promise<void> {
    const id = requireId(groupId, 'group ID');
    return labelled('delete user group', () => this.api.delete(`/v2/group/${segment(id)}`));
  }
}

export class RolesService extends Service {
  async list(teamId: string): Promise<CustomRolesResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('list custom roles', () =>
      this.api.get<CustomRolesResponse>(`/v2/team/${segment(id)}/customroles`)
    );
  }
}

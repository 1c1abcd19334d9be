/**
 * Spaces, folders and lists: the workspace hierarchy above tasks.
 */

import type {
  CreateFromTemplateRequest,
  CreateListRequest,
  CreateSpaceRequest,
  Folder,
  FoldersResponse,
  List,
  ListsResponse,
  NameRequest,
  Space,
  SpacesResponse,
  UpdateListRequest,
  UpdateSpaceRequest,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

export class SpacesService extends Service {
  async list(teamId: string, archived: boolean = false): Promise<SpacesResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('list spaces', () =>
      this.api.get<SpacesResponse>(`/v2/team/${segment(id)}/space` + query({ archived }))
    );
  }

  async get(spaceId: string): Promise<Space> {
    const id = requireId(spaceId, 'space ID');
    return labelled('get space', () => this.api.get<Space>(`/v2/space/${segment(id)}`));
  }

  async create(teamId: string, request: CreateSpaceRequest): Promise<Space> {
    const id = requireId(teamId, 'team ID');
    requireText(request.name, 'name');
    return labelled('create space', () => this.api.post<Space>(`/v2/team/${segment(id)}/space`, request));
  }

  async update(spaceId: string, request: UpdateSpaceRequest): Promise<Space> {
    const id = requireId(spaceId, 'space ID');
    return labelled('update space', () => this.api.put<Space>(`/v2/space/${segment(id)}`, request));
  }

  async delete(spaceId: string): Promise<void> {
    const id = requireId(spaceId, 'space ID');
    return labelled('delete space', () => this.api.delete(`/v2/space/${segment(id)}`));
  }
}

export class FoldersService extends Service {
  async list(spaceId: string, archived: boolean = false): Promise<FoldersResponse> {
    const id = requireId(spaceId, 'space ID');
    return labelled('list folders', () =>
      this.api.get<FoldersResponse>(`/v2/space/${segment(id)}/folder` + query({ archived }))
    );
  }

  async get(folderId: string): Promise<Folder> {
    const id = requireId(folderId, 'folder ID');
    return labelled('get folder', () => this.api.get<Folder>(`/v2/folder/${segment(id)}`));
  }

  async create(spaceId: string, request: NameRequest): Promise<Folder> {
    const id = requireId(spaceId, 'space ID');
    requireText(request.name, 'name');
    return labelled('create folder', () => this.api.post<Folder>(`/v2/space/${segment(id)}/folder`, request));
  }

  async update(folderId: string, request: NameRequest): Promise<Folder> {
    const id = requireId(folderId, 'folder ID');
    requireText(request.name, 'name');
    return labelled('update folder', () => this.api.put<Folder>(`/v2/folder/${segment(id)}`, request));
  }

  async delete(folderId: string): Promise<void> {
    const id = requireId(folderId, 'folder ID');
    return labelled('delete folder', () => this.api.delete(`/v2/folder/${segment(id)}`));
  }
}

export class ListsService extends Service {
  async listByFolder(folderId: string, archived: boolean = false): Promise<ListsResponse> {
    const id = requireId(folderId, 'folder ID');
    return labelled('list lists', () =>
      this.api.get<ListsResponse>(`/v2/folder/${segment(id)}/list` + query({ archived }))
    );
  }

  /** Lists that sit directly in a space, outside any folder. */
  async listFolderless(spaceId: string, archived: boolean = false): Promise<ListsResponse> {
    const id = requireId(spaceId, 'space ID');
    return labelled('list folderless lists', () =>
      this.api.get<ListsResponse>(`/v2/space/${segment(id)}/list` + query({ archived }))
    );
  }

  async get(listId: string): Promise<List> {
    const id = requireId(listId, 'list ID');
    return labelled('get list', () => this.api.get<List>(`/v2/list/${segment(id)}`));
  }

  async createInFolder(folderId: string, request: CreateListRequest): Promise<List> {
    const id = requireId(folderId, 'folder ID');
    requireText(request.name, 'name');
    return labelled('create list', () => this.api.post<List>(`/v2/folder/${segment(id)}/list`, request));
  }

  async createFolderless(spaceId: string, request: CreateListRequest): Promise<List> {
    const id = requireId(spaceId, 'space ID');
    requireText(request.name, 'name');
    return labelled('create folderless list', () =>
      this.api.post<List>(`/v2/space/${segment(id)}/list`, request)
    );
  }

  async createFromTemplateInFolder(
    folderId: string,
    templateId: string,
    request: CreateFromTemplateRequest
  ): Promise<List> {
    const folder = requireId(folderId, 'folder ID');
    const template = requireId(templateId, 'template ID');
    requireText(request.name, 'name');
    return labelled('create list from template in folder', () =>
      this.api.post<List>(`/v2/folder/${segment(folder)}/list_template/${segment(template)}`, request)
    );
  }

  async createFromTemplateInSpace(
    spaceId: string,
    templateId: string,
    request: CreateFromTemplateRequest
  ): Promise<List> {
    const space = requireId(spaceId, 'space ID');
    const template = requireId(templateId, 'template ID');
    requireText(request.name, 'name');
    return labelled('create list from template in space', () =>
      this.api.post<List>(`/v2/space/${segment(space)}/list_template/${segment(template)}`, request)
    );
  }

  async update(listId: string, request: UpdateListRequest): Promise<List> {
    const id = requireId(listId, 'list ID');
    return labelled('update list', () => this.api.put<List>(`/v2/list/${segment(id)}`, request));
  }

  async delete(listId: string): Promise<void> {
    const id = requireId(listId, 'list ID');
    return labelled('delete list', () => this.api.delete(`/v2/list/${segment(id)}`));
  }

  /** Add a task to an additional list (Tasks in Multiple Lists). */
  async addTask(listId: string, taskId: string): Promise<void> {
    const list = requireId(listId, 'list ID');
    const task = requireId(taskId, 'task ID');
    return labelled('add task to list', () =>
      this.api.exec('POST', `/v2/list/${segment(list)}/task/${segment(task)}`)
    );
  }

  async removeTask(listId: string, taskId: string): Promise<void> {
    const list = requireId(listId, 'list ID');
    const task = requireId(taskId, 'task ID');
    return labelled('remove task from list', () =>
      this.api.delete(`/v2/list/${segment(list)}/task/${segment(task)}`)
    );
  }
}

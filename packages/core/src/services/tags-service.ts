import type { Tag, TagsResponse } from '../types.js';
import { Service, labelled, requireId, requireText, segment } from './service-helpers.js';

export class TagsService extends Service {
  async list(spaceId: string): Promise<TagsResponse> {
    const id = requireId(spaceId, 'space ID');
    return labelled('list tags', () => this.api.get<TagsResponse>(`/v2/space/${segment(id)}/tag`));
  }

  async create(spaceId: string, tag: Tag): Promise<void> {
    const id = requireId(spaceId, 'space ID');
    requireText(tag.name, 'tag name');
    return labelled('create tag', () => this.api.exec('POST', `/v2/space/${segment(id)}/tag`, { tag }));
  }

  async delete(spaceId: string, tagName: string): Promise<void> {
    const id = requireId(spaceId, 'space ID');
    const name = requireText(tagName, 'tag name');
    return labelled('delete tag', () => this.api.delete(`/v2/space/${segment(id)}/tag/${segment(name)}`));
  }

  async addToTask(taskId: string, tagName: string): Promise<void> {
    const id = requireId(taskId, 'task ID');
    const name = requireText(tagName, 'tag name');
    return labelled('add tag to task', () =>
      this.api.exec('POST', `/v2/task/${segment(id)}/tag/${segment(name)}`)
    );
  }

  async removeFromTask(taskId: string, tagName: string): Promise<void> {
    const id = requireId(taskId, 'task ID');
    const name = requireText(tagName, 'tag name');
    return labelled('remove tag from task', () => this.api.delete(`/v2/task/${segment(id)}/tag/${segment(name)}`));
  }
}

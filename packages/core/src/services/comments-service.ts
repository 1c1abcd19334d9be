import type {
  CommentsResponse,
  CreateCommentRequest,
  CreateCommentResponse,
  PostSubtypesResponse,
  UpdateCommentRequest,
  ViewCommentsParams,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

export class CommentsService extends Service {
  async list(taskId: string): Promise<CommentsResponse> {
    const id = requireId(taskId, 'task ID');
    return labelled('list comments', () => this.api.get<CommentsResponse>(`/v2/task/${segment(id)}/comment`));
  }

  async add(taskId: string, request: CreateCommentRequest): Promise<CreateCommentResponse> {
    const id = requireId(taskId, 'task ID');
    requireText(request.comment_text, 'comment text');
    return labelled('add comment', () =>
      this.api.post<CreateCommentResponse>(`/v2/task/${segment(id)}/comment`, request)
    );
  }

  async update(commentId: string, request: UpdateCommentRequest): Promise<void> {
    const id = requireId(commentId, 'comment ID');
    requireText(request.comment_text, 'comment text');
    return labelled('update comment', () => this.api.exec('PUT', `/v2/comment/${segment(id)}`, request));
  }

  async delete(commentId: string): Promise<void> {
    const id = requireId(commentId, 'comment ID');
    return labelled('delete comment', () => this.api.delete(`/v2/comment/${segment(id)}`));
  }

  /** Threaded replies under a comment. */
  async replies(commentId: string): Promise<CommentsResponse> {
    const id = requireId(commentId, 'comment ID');
    return labelled('list comment replies', () =>
      this.api.get<CommentsResponse>(`/v2/comment/${segment(id)}/reply`)
    );
  }

  async reply(commentId: string, request: CreateCommentRequest): Promise<CreateCommentResponse> {
    const id = requireId(commentId, 'comment ID');
    requireText(request.comment_text, 'comment text');
    return labelled('reply to comment', () =>
      this.api.post<CreateCommentResponse>(`/v2/comment/${segment(id)}/reply`, request)
    );
  }

  /** Comments on a list (list-level chat in older workspaces). */
  async listComments(listId: string): Promise<CommentsResponse> {
    const id = requireId(listId, 'list ID');
    return labelled('get list comments', () => this.api.get<CommentsResponse>(`/v2/list/${segment(id)}/comment`));
  }

  async addList(listId: string, request: CreateCommentRequest): Promise<CreateCommentResponse> {
    const id = requireId(listId, 'list ID');
    requireText(request.comment_text, 'comment text');
    return labelled('add list comment', () =>
      this.api.post<CreateCommentResponse>(`/v2/list/${segment(id)}/comment`, request)
    );
  }

  /**
   * Comments on a view. `start` (epoch ms) and `startId` page backwards from
   * the oldest comment already seen.
   */
  async viewComments(viewId: string, params: ViewCommentsParams = {}): Promise<CommentsResponse> {
    const id = requireId(viewId, 'view ID');
    const path =
      `/v2/view/${segment(id)}/comment` +
      query({
        start: params.start !== undefined && params.start > 0 ? params.start : undefined,
        start_id: params.startId?.trim() || undefined,
      });
    return labelled('list view comments', () => this.api.get<CommentsResponse>(path));
  }

  async addView(viewId: string, request: CreateCommentRequest): Promise<CreateCommentResponse> {
    const id = requireId(viewId, 'view ID');
    requireText(request.comment_text, 'comment text');
    return labelled('add view comment', () =>
      this.api.post<CreateCommentResponse>(`/v2/view/${segment(id)}/comment`, request)
    );
  }

  /** Post subtype IDs for a comment type (v3). */
  async subtypes(typeId: string): Promise<PostSubtypesResponse> {
    const id = requireId(typeId, 'type ID');
    const path = this.host.v3Path(`/comments/types/${segment(id)}/subtypes`);
    return labelled('get post subtypes', () => this.api.get<PostSubtypesResponse>(path));
  }
}

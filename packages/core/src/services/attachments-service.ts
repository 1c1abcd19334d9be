/**
 * File attachments. Uploads stream the caller's bytes as a single
 * multipart part named `attachment`.
 */

import { ValidationError } from '../client/errors.js';
import type { ByteSource } from '../client/multipart.js';
import {
  ATTACHMENT_PARENT_TYPES,
  type Attachment,
  type AttachmentParentType,
  type AttachmentsResponse,
} from '../types.js';
import { Service, labelled, requireId, requireText, segment } from './service-helpers.js';

const FIELD_NAME = 'attachment';

function isParentType(value: string): value is AttachmentParentType {
  return ATTACHMENT_PARENT_TYPES.some((type) => type === value);
}

export function parseParentType(value: string): AttachmentParentType {
  const normalized = value.trim().toLowerCase();
  if (!isParentType(normalized)) {
    throw new ValidationError(`invalid parent type "${value}" (expected ${ATTACHMENT_PARENT_TYPES.join(', ')})`);
  }
  return normalized;
}

export class AttachmentsService extends Service {
  /**
   * Upload a file to a task (v2).
   */
  async upload(taskId: string, fileName: string, stream: ByteSource): Promise<Attachment> {
    const id = requireId(taskId, 'task ID');
    requireText(fileName, 'file name');
    return labelled('upload attachment', () =>
      this.api.sendMultipart<Attachment>({
        path: `/v2/task/${segment(id)}/attachment`,
        fieldName: FIELD_NAME,
        stream,
        fileName,
      })
    );
  }

  async list(parentType: string, parentId: string): Promise<AttachmentsResponse> {
    const type = parseParentType(parentType);
    const id = requireId(parentId, 'parent ID');
    const path = this.host.v3Path(`/${type}/${segment(id)}/attachments`);
    return labelled('list attachments', () => this.api.get<AttachmentsResponse>(path));
  }

  /**
   * Upload a file to any parent entity (v3).
   */
  async create(parentType: string, parentId: string, fileName: string, stream: ByteSource): Promise<Attachment> {
    const type = parseParentType(parentType);
    const id = requireId(parentId, 'parent ID');
    requireText(fileName, 'file name');
    const path = this.host.v3Path(`/${type}/${segment(id)}/attachments`);
    return labelled('create attachment', () =>
      this.api.sendMultipart<Attachment>({ path, fieldName: FIELD_NAME, stream, fileName })
    );
  }
}

/**
 * Docs (v3).
 */

import { ValidationError } from '../client/errors.js';
import type {
  CreateDocRequest,
  CreatePageRequest,
  Doc,
  DocPage,
  DocParentType,
  DocsResponse,
  EditPageRequest,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

/** Numeric parent type codes the v3 Docs API expects. */
export const DOC_PARENT_TYPE_CODES: Readonly<Record<DocParentType, number>> = {
  space: 4,
  folder: 5,
  list: 6,
  workspace: 12,
};

function isDocParentType(value: string): value is DocParentType {
  return Object.hasOwn(DOC_PARENT_TYPE_CODES, value);
}

export interface CreateDocOptions {
  name: string;
  parentType?: string;
  parentId?: string;
  visibility?: CreateDocRequest['visibility'];
}

export class DocsService extends Service {
  async search(searchQuery?: string, cursor?: string): Promise<DocsResponse> {
    const path = this.host.v3Path('/docs') + query({ q: searchQuery?.trim() || undefined, cursor });
    return labelled('search docs', () => this.api.get<DocsResponse>(path));
  }

  async get(docId: string): Promise<Doc> {
    const id = requireId(docId, 'doc ID');
    const path = this.host.v3Path(`/docs/${segment(id)}`);
    return labelled('get doc', () => this.api.get<Doc>(path));
  }

  async create(options: CreateDocOptions): Promise<Doc> {
    requireText(options.name, 'doc name');
    const request: CreateDocRequest = { name: options.name, visibility: options.visibility };

    if (options.parentType !== undefined || options.parentId !== undefined) {
      const type = options.parentType?.trim().toLowerCase() ?? '';
      if (!isDocParentType(type)) {
        throw new ValidationError(
          `invalid parent type "${options.parentType ?? ''}" (expected ${Object.keys(DOC_PARENT_TYPE_CODES).join(', ')})`
        );
      }
      request.parent = { id: requireId(options.parentId, 'parent ID'), type: DOC_PARENT_TYPE_CODES[type] };
    }

    const path = this.host.v3Path('/docs');
    return labelled('create doc', () => this.api.post<Doc>(path, request));
  }

  async pages(docId: string): Promise<DocPage[]> {
    const id = requireId(docId, 'doc ID');
    const path = this.host.v3Path(`/docs/${segment(id)}/pages`);
    return labelled('list doc pages', () => this.api.get<DocPage[]>(path));
  }

  async getPage(docId: string, pageId: string): Promise<DocPage> {
    const doc = requireId(docId, 'doc ID');
    const page = requireId(pageId, 'page ID');
    const path = this.host.v3Path(`/docs/${segment(doc)}/pages/${segment(page)}`);
    return labelled('get doc page', () => this.api.get<DocPage>(path));
  }

  async createPage(docId: string, request: CreatePageRequest): Promise<DocPage> {
    const id = requireId(docId, 'doc ID');
    requireText(request.name, 'page name');
    const path = this.host.v3Path(`/docs/${segment(id)}/pages`);
    return labelled('create doc page', () => this.api.post<DocPage>(path, request));
  }

  async editPage(docId: string, pageId: string, request: EditPageRequest): Promise<void> {
    const doc = requireId(docId, 'doc ID');
    const page = requireId(pageId, 'page ID');
    const path = this.host.v3Path(`/docs/${segment(doc)}/pages/${segment(page)}`);
    return labelled('edit doc page', () => this.api.exec('PUT', path, request));
  }
}

/**
 * ClickUp API facade: one transport, an optional workspace ID for v3
 * endpoints, and a service per resource group.
 */

import { AttachmentsService } from '../services/attachments-service.js';
import { AuthService } from '../services/auth-service.js';
import { ChatService } from '../services/chat-service.js';
import { CommentsService } from '../services/comments-service.js';
import { DocsService } from '../services/docs-service.js';
import { GoalsService } from '../services/goals-service.js';
import { RolesService, UserGroupsService } from '../services/groups-service.js';
import { FoldersService, ListsService, SpacesService } from '../services/hierarchy-service.js';
import type { ServiceHost } from '../services/service-helpers.js';
import { TagsService } from '../services/tags-service.js';
import { TasksService } from '../services/tasks-service.js';
import { TimeService } from '../services/time-service.js';
import { WebhooksService } from '../services/webhooks-service.js';
import { MembersService, WorkspacesService } from '../services/workspaces-service.js';
import { createApiClient, type ApiClient, type ApiClientOption } from './api-client.js';
import { ValidationError } from './errors.js';

interface ServiceRegistry {
  auth: AuthService;
  workspaces: WorkspacesService;
  members: MembersService;
  groups: UserGroupsService;
  roles: RolesService;
  spaces: SpacesService;
  folders: FoldersService;
  lists: ListsService;
  tasks: TasksService;
  comments: CommentsService;
  time: TimeService;
  tags: TagsService;
  webhooks: WebhooksService;
  goals: GoalsService;
  attachments: AttachmentsService;
  chat: ChatService;
  docs: DocsService;
}

export interface ClickUpClientConfig {
  /** Required by v3 endpoints only. */
  workspaceId?: string;
}

export class ClickUpClient implements ServiceHost {
  readonly workspaceId: string;

  private readonly services: Partial<ServiceRegistry> = {};

  constructor(readonly api: ApiClient, config: ClickUpClientConfig = {}) {
    this.workspaceId = config.workspaceId?.trim() ?? '';
  }

  /**
   * Prefix a v3 path with the configured workspace.
   */
  v3Path(path: string): string {
    if (this.workspaceId === '') {
      throw new ValidationError('workspace ID required for v3 API; set CLICKUP_WORKSPACE_ID or use --workspace flag');
    }
    return `/v3/workspaces/${encodeURIComponent(this.workspaceId)}${path}`;
  }

  get auth(): AuthService {
    return (this.services.auth ??= new AuthService(this));
  }

  get workspaces(): WorkspacesService {
    return (this.services.workspaces ??= new WorkspacesService(this));
  }

  get members(): MembersService {
    return (this.services.members ??= new MembersService(this));
  }

  get groups(): UserGroupsService {
    return (this.services.groups ??= new UserGroupsService(this));
  }

  get roles(): RolesService {
    return (this.services.roles ??= new RolesService(this));
  }

  get spaces(): SpacesService {
    return (this.services.spaces ??= new SpacesService(this));
  }

  get folders(): FoldersService {
    return (this.services.folders ??= new FoldersService(this));
  }

  get lists(): ListsService {
    return (this.services.lists ??= new ListsService(this));
  }

  get tasks(): TasksService {
    return (this.services.tasks ??= new TasksService(this));
  }

  get comments(): CommentsService {
    return (this.services.comments ??= new CommentsService(this));
  }

  get time(): TimeService {
    return (this.services.time ??= new TimeService(this));
  }

  get tags(): TagsService {
    return (this.services.tags ??= new TagsService(this));
  }

  get webhooks(): WebhooksService {
    return (this.services.webhooks ??= new WebhooksService(this));
  }

  get goals(): GoalsService {
    return (this.services.goals ??= new GoalsService(this));
  }

  get attachments(): AttachmentsService {
    return (this.services.attachments ??= new AttachmentsService(this));
  }

  get chat(): ChatService {
    return (this.services.chat ??= new ChatService(this));
  }

  get docs(): DocsService {
    return (this.services.docs ??= new DocsService(this));
  }
}

export function createClickUpClient(
  apiKey: string,
  config: ClickUpClientConfig = {},
  ...options: ApiClientOption[]
): ClickUpClient {
  return new ClickUpClient(createApiClient(apiKey, ...options), config);
}

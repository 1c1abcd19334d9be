/**
 * Services module for clickup-cli
 */

export { AttachmentsService, parseParentType } from './attachments-service.js';
export { AuthService } from './auth-service.js';
export { ChatService } from './chat-service.js';
export { CommentsService } from './comments-service.js';
export { DOC_PARENT_TYPE_CODES, DocsService, type CreateDocOptions } from './docs-service.js';
export { GoalsService } from './goals-service.js';
export { RolesService, UserGroupsService } from './groups-service.js';
export { FoldersService, ListsService, SpacesService } from './hierarchy-service.js';
export { Service, type ServiceHost } from './service-helpers.js';
export { TagsService } from './tags-service.js';
export { TasksService } from './tasks-service.js';
export { TimeService } from './time-service.js';
export { WebhooksService } from './webhooks-service.js';
export { MembersService, WorkspacesService } from './workspaces-service.js';

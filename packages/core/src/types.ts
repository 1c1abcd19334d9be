/**
 * Wire types for the ClickUp v2 and v3 REST APIs.
 *
 * Field names follow the JSON the API sends, so decoded responses can be
 * printed back out unchanged in JSON mode.
 */

// ============================================
// Shared
// ============================================

export interface User {
  id: number;
  username: string;
  email?: string;
  color?: string;
  initials?: string;
}

export interface StatusRef {
  status: string;
  color?: string;
  type?: string;
}

export interface Priority {
  id: string;
  priority: string;
  color?: string;
}

export interface Ref {
  id: string;
  name?: string;
}

export interface Tag {
  name: string;
  tag_fg?: string;
  tag_bg?: string;
}

// ============================================
// Auth & Workspaces
// ============================================

export interface AuthorizedUserResponse {
  user: User;
}

export interface OAuthTokenRequest {
  client_id: string;
  client_secret: string;
  code: string;
}

export interface OAuthTokenResponse {
  access_token: string;
}

export interface Workspace {
  id: string;
  name: string;
  color?: string;
  members?: Member[];
}

export interface WorkspacesResponse {
  teams: Workspace[];
}

export interface WorkspacePlanResponse {
  plan_id: number;
  plan_name: string;
}

export interface SeatUsage {
  filled_members_seats?: number;
  total_member_seats?: number;
  empty_member_seats?: number;
  filled_guest_seats?: number;
  total_guest_seats?: number;
  empty_guest_seats?: number;
}

export interface WorkspaceSeatsResponse {
  members: SeatUsage;
  guests: SeatUsage;
}

export interface Member {
  user: User;
}

export interface MembersResponse {
  members: User[];
}

/** `GET /team/{id}`: one workspace with its members. */
export interface TeamResponse {
  team: Workspace;
}

export interface UserGroup {
  id: string;
  team_id?: string;
  name: string;
  handle?: string;
  members: User[];
}

export interface UserGroupsResponse {
  groups: UserGroup[];
}

export interface CreateUserGroupRequest {
  name: string;
  members?: number[];
}

export interface UserGroupMembersUpdate {
  add?: number[];
  rem?: number[];
}

export interface UpdateUserGroupRequest {
  name?: string;
  members?: UserGroupMembersUpdate;
}

export interface CustomRole {
  id: number;
  name: string;
  permissions?: string[];
}

export interface CustomRolesResponse {
  custom_roles: CustomRole[];
}

// ============================================
// Hierarchy: spaces, folders, lists
// ============================================

export interface Space {
  id: string;
  name: string;
  private?: boolean;
  archived?: boolean;
  statuses?: StatusRef[];
}

export interface SpacesResponse {
  spaces: Space[];
}

export interface CreateSpaceRequest {
  name: string;
  multiple_assignees?: boolean;
}

export interface UpdateSpaceRequest {
  name?: string;
  color?: string;
  private?: boolean;
}

export interface List {
  id: string;
  name: string;
  content?: string;
  task_count?: number | null;
  due_date?: string | null;
  folder?: Ref;
  space?: Ref;
  archived?: boolean;
}

export interface Folder {
  id: string;
  name: string;
  hidden?: boolean;
  task_count?: string;
  space?: Ref;
  lists?: List[];
}

export interface FoldersResponse {
  folders: Folder[];
}

export interface ListsResponse {
  lists: List[];
}

export interface NameRequest {
  name: string;
}

export interface CreateListRequest {
  name: string;
  content?: string;
  due_date?: number;
  priority?: number;
  assignee?: number;
}

export interface UpdateListRequest {
  name?: string;
  content?: string;
  due_date?: number;
}

// ============================================
// Tasks
// ============================================

export interface Task {
  id: string;
  custom_id?: string | null;
  name: string;
  description?: string;
  text_content?: string;
  status: StatusRef;
  priority: Priority | null;
  due_date?: string | null;
  date_created?: string;
  date_updated?: string;
  assignees?: User[];
  tags?: Tag[];
  url?: string;
  list?: Ref;
  folder?: Ref;
  space?: Ref;
}

export interface TasksResponse {
  tasks: Task[];
  last_page?: boolean;
}

export interface CreateTaskRequest {
  name: string;
  description?: string;
  assignees?: number[];
  tags?: string[];
  status?: string;
  priority?: number;
  due_date?: number;
  parent?: string;
}

export interface TaskAssigneesUpdate {
  add?: number[];
  rem?: number[];
}

export interface UpdateTaskRequest {
  name?: string;
  description?: string;
  status?: string;
  priority?: number;
  due_date?: number;
  assignees?: TaskAssigneesUpdate;
}

export interface ListTasksParams {
  status?: string;
  assignee?: string;
  page?: number;
  includeClosed?: boolean;
}

export interface SearchTasksParams {
  page?: number;
  orderBy?: string;
  reverse?: boolean;
  subtasks?: boolean;
  includeClosed?: boolean;
  statuses?: string[];
  assignees?: number[];
  tags?: string[];
  dueDateGt?: number;
  dueDateLt?: number;
}

export interface StatusHistoryEntry {
  status: string;
  color?: string;
  total_time: { by_minute: number; since: string };
}

export interface TimeInStatusResponse {
  current_status: StatusHistoryEntry;
  status_history: StatusHistoryEntry[];
}

/** Keyed by task ID. */
export type BulkTimeInStatusResponse = Record<string, TimeInStatusResponse>;

export interface CreateFromTemplateRequest {
  name: string;
}

export interface MoveTaskResponse {
  id?: string;
  home_list?: Ref;
}

// ============================================
// Comments
// ============================================

export interface Comment {
  id: string;
  comment_text: string;
  user: User;
  date: string;
  resolved?: boolean;
  reply_count?: number;
}

export interface CommentsResponse {
  comments: Comment[];
}

export interface CreateCommentRequest {
  comment_text: string;
  notify_all?: boolean;
  assignee?: number;
}

export interface UpdateCommentRequest {
  comment_text: string;
  resolved?: boolean;
}

export interface CreateCommentResponse {
  id: string | number;
  hist_id?: string;
  date?: number;
}

export interface ViewCommentsParams {
  start?: number;
  startId?: string;
}

export interface PostSubtype {
  id: string;
  name: string;
}

export interface PostSubtypesResponse {
  subtypes: PostSubtype[];
}

// ============================================
// Time tracking
// ============================================

export interface TimeEntry {
  id: string;
  task?: Ref | null;
  wid?: string;
  user?: User;
  billable?: boolean;
  start: string;
  end?: string;
  duration: string;
  description?: string;
  tags?: Tag[];
}

export interface TimeEntriesResponse {
  data: TimeEntry[];
}

export interface TimeEntryResponse {
  data: TimeEntry | null;
}

export interface CreateTimeEntryRequest {
  tid?: string;
  start: number;
  duration: number;
  description?: string;
  billable?: boolean;
}

export interface StartTimerRequest {
  tid?: string;
  description?: string;
  billable?: boolean;
}

export interface UpdateTimeEntryRequest {
  tid?: string;
  description?: string;
  start?: number;
  end?: number;
  duration?: number;
  billable?: boolean;
  tags?: Tag[];
  tag_action?: 'add' | 'remove';
}

export interface TimeEntryChange {
  id: string;
  field: string;
  before?: unknown;
  after?: unknown;
  date: string;
  user?: User;
}

export interface TimeEntryHistoryResponse {
  data: TimeEntryChange[];
}

export interface TimeEntryTagsResponse {
  data: Tag[];
}

export interface TimeEntryTagsRequest {
  time_entry_ids: string[];
  tags: Tag[];
}

export interface RenameTimeEntryTagRequest {
  name: string;
  new_name: string;
}

// ============================================
// Tags
// ============================================

export interface TagsResponse {
  tags: Tag[];
}

export interface CreateTagRequest {
  tag: Tag;
}

// ============================================
// Webhooks
// ============================================

export interface Webhook {
  id: string;
  userid?: number;
  team_id?: number;
  endpoint: string;
  client_id?: string;
  events: string[];
  task_id?: string | null;
  list_id?: number | null;
  folder_id?: number | null;
  space_id?: number | null;
  health?: { status: string; fail_count: number };
  secret?: string;
}

export interface WebhooksResponse {
  webhooks: Webhook[];
}

export interface CreateWebhookRequest {
  endpoint: string;
  events: string[];
  space_id?: number;
  folder_id?: number;
  list_id?: number;
  task_id?: string;
}

export interface CreateWebhookResponse {
  id: string;
  webhook: Webhook;
}

export interface UpdateWebhookRequest {
  endpoint?: string;
  events?: string[];
  status?: 'active' | 'inactive';
}

// ============================================
// Goals
// ============================================

export interface Goal {
  id: string;
  name: string;
  team_id?: string;
  description?: string;
  due_date?: string;
  color?: string;
  percent_completed?: number;
  archived?: boolean;
}

export interface GoalsResponse {
  goals: Goal[];
  folders?: Array<{ id: string; name: string; goals: Goal[] }>;
}

export interface GoalResponse {
  goal: Goal;
}

export interface CreateGoalRequest {
  name: string;
  due_date?: number;
  description?: string;
  multiple_owners?: boolean;
  owners?: number[];
  color?: string;
}

export interface UpdateGoalRequest {
  name?: string;
  due_date?: number;
  description?: string;
  color?: string;
}

// ============================================
// Attachments
// ============================================

export type AttachmentParentType = 'task' | 'list' | 'folder' | 'space';

export const ATTACHMENT_PARENT_TYPES: readonly AttachmentParentType[] = ['task', 'list', 'folder', 'space'];

export interface Attachment {
  id: string;
  title: string;
  url: string;
  extension?: string;
  size?: number;
  date?: number | string;
}

export interface AttachmentsResponse {
  attachments: Attachment[];
}

// ============================================
// Chat (v3)
// ============================================

export interface ChatChannel {
  id: string;
  name: string;
  type?: string;
  member_count?: number;
}

export interface ChatMessage {
  id: string;
  content: string;
  user_id?: string;
  type?: string;
  date_created?: number | string;
  parent_channel?: string;
  replies_count?: number;
}

export interface CursorPage {
  next_cursor?: string;
}

export interface ChatChannelsResponse extends CursorPage {
  data: ChatChannel[];
}

export interface ChatMessagesResponse extends CursorPage {
  data: ChatMessage[];
}

export interface CreateChatChannelRequest {
  name: string;
  description?: string;
  visibility?: 'PUBLIC' | 'PRIVATE';
}

export interface SendMessageRequest {
  content: string;
  type?: 'message' | 'post';
  content_format?: ContentFormat;
}

// ============================================
// Docs (v3)
// ============================================

export interface Doc {
  id: string;
  name: string;
  date_created?: number;
  creator?: number;
  parent?: { id: string; type: number };
}

export interface DocsResponse extends CursorPage {
  docs: Doc[];
}

export interface DocPage {
  id: string;
  name: string;
  content?: string;
  doc_id?: string;
  pages?: DocPage[];
}

export type DocParentType = 'space' | 'folder' | 'list' | 'workspace';

export interface CreateDocRequest {
  name: string;
  parent?: { id: string; type: number };
  visibility?: 'PUBLIC' | 'PRIVATE' | 'PERSONAL';
  create_page?: boolean;
}

export type ContentFormat = 'text/md' | 'text/plain';

export interface CreatePageRequest {
  name: string;
  content?: string;
  content_format?: ContentFormat;
  parent_page_id?: string;
}

export interface EditPageRequest {
  name?: string;
  content?: string;
  content_format?: ContentFormat;
  content_edit_mode?: 'replace' | 'append' | 'prepend';
}

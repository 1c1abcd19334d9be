export const APP_NAME = 'clickup-cli';
export const VERSION = '0.1.0';

export const DEFAULT_BASE_URL = 'https://api.clickup.com/api';
export const DEFAULT_USER_AGENT = `${APP_NAME}/${VERSION}`;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const OAUTH_AUTHORIZE_URL = 'https://app.clickup.com/api';

export const ENV = {
  apiKey: 'CLICKUP_API_KEY',
  teamId: 'CLICKUP_TEAM_ID',
  workspaceId: 'CLICKUP_WORKSPACE_ID',
  json: 'CLICKUP_CLI_JSON',
  plain: 'CLICKUP_CLI_PLAIN',
} as const;

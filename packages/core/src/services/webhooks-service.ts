import { ValidationError } from '../client/errors.js';
import type {
  CreateWebhookRequest,
  CreateWebhookResponse,
  UpdateWebhookRequest,
  Webhook,
  WebhooksResponse,
} from '../types.js';
import { Service, labelled, requireId, requireText, segment } from './service-helpers.js';

export class WebhooksService extends Service {
  async list(teamId: string): Promise<WebhooksResponse> {
    const id = requireId(teamId, 'team ID');
    return labelled('list webhooks', () => this.api.get<WebhooksResponse>(`/v2/team/${segment(id)}/webhook`));
  }

  async create(teamId: string, request: CreateWebhookRequest): Promise<CreateWebhookResponse> {
    const id = requireId(teamId, 'team ID');
    requireText(request.endpoint, 'endpoint URL');
    if (request.events.length === 0) {
      throw new ValidationError('at least one event is required');
    }
    return labelled('create webhook', () =>
      this.api.post<CreateWebhookResponse>(`/v2/team/${segment(id)}/webhook`, request)
    );
  }

  async update(webhookId: string, request: UpdateWebhookRequest): Promise<{ id: string; webhook: Webhook }> {
    const id = requireId(webhookId, 'webhook ID');
    return labelled('update webhook', () =>
      this.api.put<{ id: string; webhook: Webhook }>(`/v2/webhook/${segment(id)}`, request)
    );
  }

  async delete(webhookId: string): Promise<void> {
    const id = requireId(webhookId, 'webhook ID');
    return labelled('delete webhook', () => this.api.delete(`/v2/webhook/${segment(id)}`));
  }
}

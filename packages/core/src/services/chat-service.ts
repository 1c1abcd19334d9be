/**
 * Chat (v3). Listing endpoints are cursor-paged; the cursor is passed
 * through untouched.
 */

import type {
  ChatChannel,
  ChatChannelsResponse,
  ChatMessage,
  ChatMessagesResponse,
  CreateChatChannelRequest,
  SendMessageRequest,
} from '../types.js';
import { Service, labelled, query, requireId, requireText, segment } from './service-helpers.js';

export class ChatService extends Service {
  async listChannels(cursor?: string): Promise<ChatChannelsResponse> {
    const path = this.host.v3Path('/chat/channels') + query({ cursor });
    return labelled('list chat channels', () => this.api.get<ChatChannelsResponse>(path));
  }

  async getChannel(channelId: string): Promise<ChatChannel> {
    const id = requireId(channelId, 'channel ID');
    const path = this.host.v3Path(`/chat/channels/${segment(id)}`);
    return labelled('get chat channel', () => this.api.get<ChatChannel>(path));
  }

  async createChannel(request: CreateChatChannelRequest): Promise<ChatChannel> {
    requireText(request.name, 'channel name');
    const path = this.host.v3Path('/chat/channels');
    return labelled('create chat channel', () => this.api.post<ChatChannel>(path, request));
  }

  async deleteChannel(channelId: string): Promise<void> {
    const id = requireId(channelId, 'channel ID');
    const path = this.host.v3Path(`/chat/channels/${segment(id)}`);
    return labelled('delete chat channel', () => this.api.delete(path));
  }

  async listMessages(channelId: string, cursor?: string): Promise<ChatMessagesResponse> {
    const id = requireId(channelId, 'channel ID');
    const path = this.host.v3Path(`/chat/channels/${segment(id)}/messages`) + query({ cursor });
    return labelled('list chat messages', () => this.api.get<ChatMessagesResponse>(path));
  }

  async sendMessage(channelId: string, request: SendMessageRequest): Promise<ChatMessage> {
    const id = requireId(channelId, 'channel ID');
    requireText(request.content, 'message content');
    const path = this.host.v3Path(`/chat/channels/${segment(id)}/messages`);
    return labelled('send chat message', () => this.api.post<ChatMessage>(path, request));
  }

  async deleteMessage(messageId: string): Promise<void> {
    const id = requireId(messageId, 'message ID');
    const path = this.host.v3Path(`/chat/messages/${segment(id)}`);
    return labelled('delete chat message', () => this.api.delete(path));
  }
}

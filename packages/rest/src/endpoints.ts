// packages/rest/src/endpoints.ts
import type { Field, GatewayBotInfo, MessageLike, RestFile } from '@gatecord/types';
import { serializeFields } from '@gatecord/types';
import type { RequestExecutor } from './executor.js';

/** 메시지 생성/수정 본문: 도메인 스키마는 검증하지 않는다 */
export type MessageBody = Record<string, unknown>;

/** PATCH 본문: 생략(unset)과 null 지우기를 구분 */
export type PatchFields = Record<string, Field<unknown>>;

/**
 * 엔드포인트 헬퍼
 *
 * 모두 RequestExecutor.execute() 위의 얇은 래퍼다.
 */
export class RestApi {
  constructor(private readonly executor: RequestExecutor) {}

  getGatewayBot(): Promise<GatewayBotInfo> {
    return this.executor.execute({ method: 'GET', route: '/gateway/bot' });
  }

  // ── 메시지 ──

  createMessage(
    channelId: string,
    body: MessageBody,
    files?: readonly RestFile[],
  ): Promise<MessageLike> {
    return this.executor.execute({
      method: 'POST',
      route: '/channels/{channel_id}/messages',
      params: { channel_id: channelId },
      body,
      files,
    });
  }

  editMessage(channelId: string, messageId: string, body: MessageBody): Promise<MessageLike> {
    return this.executor.execute({
      method: 'PATCH',
      route: '/channels/{channel_id}/messages/{message_id}',
      params: { channel_id: channelId, message_id: messageId },
      body,
    });
  }

  // ── 채널 ──

  editChannel(channelId: string, fields: PatchFields, reason?: string): Promise<unknown> {
    return this.executor.execute({
      method: 'PATCH',
      route: '/channels/{channel_id}',
      params: { channel_id: channelId },
      body: serializeFields(fields),
      reason,
    });
  }

  deleteChannel(channelId: string, reason?: string): Promise<unknown> {
    return this.executor.execute({
      method: 'DELETE',
      route: '/channels/{channel_id}',
      params: { channel_id: channelId },
      reason,
    });
  }

  createGuildChannel(guildId: string, body: Record<string, unknown>, reason?: string): Promise<unknown> {
    return this.executor.execute({
      method: 'POST',
      route: '/guilds/{guild_id}/channels',
      params: { guild_id: guildId },
      body,
      reason,
    });
  }

  // ── 멤버 ──

  addGuildMemberRole(guildId: string, userId: string, roleId: string, reason?: string): Promise<unknown> {
    return this.executor.execute({
      method: 'PUT',
      route: '/guilds/{guild_id}/members/{user_id}/roles/{role_id}',
      params: { guild_id: guildId, user_id: userId, role_id: roleId },
      reason,
    });
  }

  removeGuildMemberRole(
    guildId: string,
    userId: string,
    roleId: string,
    reason?: string,
  ): Promise<unknown> {
    return this.executor.execute({
      method: 'DELETE',
      route: '/guilds/{guild_id}/members/{user_id}/roles/{role_id}',
      params: { guild_id: guildId, user_id: userId, role_id: roleId },
      reason,
    });
  }

  editGuildMember(
    guildId: string,
    userId: string,
    fields: PatchFields,
    reason?: string,
  ): Promise<unknown> {
    return this.executor.execute({
      method: 'PATCH',
      route: '/guilds/{guild_id}/members/{user_id}',
      params: { guild_id: guildId, user_id: userId },
      body: serializeFields(fields),
      reason,
    });
  }

  // ── 애플리케이션 커맨드 ──

  bulkUpsertGlobalCommands(
    applicationId: string,
    commands: readonly Record<string, unknown>[],
  ): Promise<unknown[]> {
    return this.executor.execute({
      method: 'PUT',
      route: '/applications/{application_id}/commands',
      params: { application_id: applicationId },
      body: commands,
    });
  }

  bulkUpsertGuildCommands(
    applicationId: string,
    guildId: string,
    commands: readonly Record<string, unknown>[],
  ): Promise<unknown[]> {
    return this.executor.execute({
      method: 'PUT',
      route: '/applications/{application_id}/guilds/{guild_id}/commands',
      params: { application_id: applicationId, guild_id: guildId },
      body: commands,
    });
  }

  // ── 인터랙션 ──

  /** 인터랙션 콜백은 전역 레이트 리밋 대상이 아니다 */
  createInteractionResponse(
    interactionId: string,
    interactionToken: string,
    body: MessageBody,
    files?: readonly RestFile[],
  ): Promise<unknown> {
    return this.executor.execute({
      method: 'POST',
      route: '/interactions/{interaction_id}/{webhook_token}/callback',
      params: { interaction_id: interactionId, webhook_token: interactionToken },
      body,
      files,
      global: false,
    });
  }

  getOriginalInteractionResponse(applicationId: string, interactionToken: string): Promise<MessageLike> {
    return this.executor.execute({
      method: 'GET',
      route: '/webhooks/{webhook_id}/{webhook_token}/messages/@original',
      params: { webhook_id: applicationId, webhook_token: interactionToken },
    });
  }

  editOriginalInteractionResponse(
    applicationId: string,
    interactionToken: string,
    body: MessageBody,
    files?: readonly RestFile[],
  ): Promise<MessageLike> {
    return this.executor.execute({
      method: 'PATCH',
      route: '/webhooks/{webhook_id}/{webhook_token}/messages/@original',
      params: { webhook_id: applicationId, webhook_token: interactionToken },
      body,
      files,
    });
  }

  deleteOriginalInteractionResponse(applicationId: string, interactionToken: string): Promise<unknown> {
    return this.executor.execute({
      method: 'DELETE',
      route: '/webhooks/{webhook_id}/{webhook_token}/messages/@original',
      params: { webhook_id: applicationId, webhook_token: interactionToken },
    });
  }

  createFollowupMessage(
    applicationId: string,
    interactionToken: string,
    body: MessageBody,
    files?: readonly RestFile[],
  ): Promise<MessageLike> {
    return this.executor.execute({
      method: 'POST',
      route: '/webhooks/{webhook_id}/{webhook_token}',
      params: { webhook_id: applicationId, webhook_token: interactionToken },
      body,
      files,
    });
  }

  editFollowupMessage(
    applicationId: string,
    interactionToken: string,
    messageId: string,
    body: MessageBody,
  ): Promise<MessageLike> {
    return this.executor.execute({
      method: 'PATCH',
      route: '/webhooks/{webhook_id}/{webhook_token}/messages/{message_id}',
      params: { webhook_id: applicationId, webhook_token: interactionToken, message_id: messageId },
      body,
    });
  }

  deleteFollowupMessage(
    applicationId: string,
    interactionToken: string,
    messageId: string,
  ): Promise<unknown> {
    return this.executor.execute({
      method: 'DELETE',
      route: '/webhooks/{webhook_id}/{webhook_token}/messages/{message_id}',
      params: { webhook_id: applicationId, webhook_token: interactionToken, message_id: messageId },
    });
  }
}

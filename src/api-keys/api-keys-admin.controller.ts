import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  Param,
  Patch,
  Post,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';

import { AdminAuthGuard, RequestWithAdminIdentity } from '../admin-sessions/admin-auth.guard';
import { parseBoolean } from '../utils/parse-boolean';
import { ApiKeyStore, ApiKeyStoreStatus } from './api-key-store.service';
import { ApiKeyStats, ApiKeyView, CreateApiKeyInput, UpdateApiKeyInput, UsageStats } from './types';

type ApiKeyBody = {
  name?: unknown;
  rateLimitPerMinute?: unknown;
  rateLimitPerDay?: unknown;
  isActive?: unknown;
};

type AuditAction = 'create' | 'list' | 'stats' | 'update' | 'deactivate' | 'activate' | 'delete';

const MAX_NAME_LENGTH = 100;
const MAX_PER_MINUTE = 1000;
const MAX_PER_DAY = 100000;

@Controller('admin')
@UseGuards(AdminAuthGuard)
export class ApiKeysAdminController {
  private readonly logger = new Logger(ApiKeysAdminController.name);

  constructor(private readonly store: ApiKeyStore) {}

  @Post('keys')
  async create(
    @Req() request: RequestWithAdminIdentity,
    @Body() body: ApiKeyBody,
  ): Promise<ApiKeyView & { apiKey: string }> {
    const input = this.parseCreateBody(body);

    try {
      const { secret, key } = await this.store.create(input);
      this.audit(request, 'create', 'ok', { keyId: key.id, name: key.name });

      // The only response that ever carries the plaintext key.
      return { ...key, apiKey: secret };
    } catch (error) {
      this.audit(request, 'create', 'error', {
        name: input.name,
        reason: this.errorReason(error),
      });
      throw error;
    }
  }

  @Get('keys')
  list(
    @Req() request: RequestWithAdminIdentity,
    @Query('includeInactive') includeInactive?: string,
  ): { items: ApiKeyView[] } {
    const items = this.store.list({ includeInactive: parseBoolean(includeInactive, true) });
    this.audit(request, 'list', 'ok', { count: items.length });
    return { items };
  }

  @Get('keys/:id')
  stats(@Req() request: RequestWithAdminIdentity, @Param('id') id: string): ApiKeyStats {
    const keyId = this.parseKeyId(id);
    try {
      return this.store.getStats(keyId);
    } catch (error) {
      this.audit(request, 'stats', 'error', { keyId, reason: this.errorReason(error) });
      throw error;
    }
  }

  @Patch('keys/:id')
  async update(
    @Req() request: RequestWithAdminIdentity,
    @Param('id') id: string,
    @Body() body: ApiKeyBody,
  ): Promise<ApiKeyView> {
    const keyId = this.parseKeyId(id);
    const patch = this.parseUpdateBody(body);
    return this.run(request, 'update', keyId, () => this.store.update(keyId, patch));
  }

  @Post('keys/:id/deactivate')
  async deactivate(
    @Req() request: RequestWithAdminIdentity,
    @Param('id') id: string,
  ): Promise<ApiKeyView> {
    const keyId = this.parseKeyId(id);
    return this.run(request, 'deactivate', keyId, () => this.store.deactivate(keyId));
  }

  @Post('keys/:id/activate')
  async activate(
    @Req() request: RequestWithAdminIdentity,
    @Param('id') id: string,
  ): Promise<ApiKeyView> {
    const keyId = this.parseKeyId(id);
    return this.run(request, 'activate', keyId, () => this.store.activate(keyId));
  }

  @Delete('keys/:id')
  async remove(
    @Req() request: RequestWithAdminIdentity,
    @Param('id') id: string,
  ): Promise<{ ok: true }> {
    const keyId = this.parseKeyId(id);
    await this.run(request, 'delete', keyId, () => this.store.delete(keyId));
    return { ok: true };
  }

  @Get('stats')
  usage(): UsageStats {
    return this.store.getUsageStats();
  }

  @Get('storage')
  storage(): ApiKeyStoreStatus {
    return this.store.status();
  }

  private async run<T>(
    request: RequestWithAdminIdentity,
    action: AuditAction,
    keyId: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      const result = await operation();
      this.audit(request, action, 'ok', { keyId });
      return result;
    } catch (error) {
      this.audit(request, action, 'error', { keyId, reason: this.errorReason(error) });
      throw error;
    }
  }

  private parseCreateBody(body: ApiKeyBody): CreateApiKeyInput {
    const name = this.parseName(body?.name);
    if (name === undefined) {
      throw new BadRequestException('name is required');
    }

    return {
      name,
      rateLimitPerMinute: this.optionalLimit(body?.rateLimitPerMinute, 'rateLimitPerMinute', MAX_PER_MINUTE),
      rateLimitPerDay: this.optionalLimit(body?.rateLimitPerDay, 'rateLimitPerDay', MAX_PER_DAY),
      isActive: this.optionalBoolean(body?.isActive, 'isActive'),
    };
  }

  private parseUpdateBody(body: ApiKeyBody): UpdateApiKeyInput {
    const patch: UpdateApiKeyInput = {
      name: this.parseName(body?.name),
      rateLimitPerMinute: this.optionalLimit(body?.rateLimitPerMinute, 'rateLimitPerMinute', MAX_PER_MINUTE),
      rateLimitPerDay: this.optionalLimit(body?.rateLimitPerDay, 'rateLimitPerDay', MAX_PER_DAY),
      isActive: this.optionalBoolean(body?.isActive, 'isActive'),
    };

    if (Object.values(patch).every((value) => value === undefined)) {
      throw new BadRequestException('No updatable fields provided');
    }

    return patch;
  }

  private parseName(value: unknown): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'string') {
      throw new BadRequestException('name must be a string');
    }

    const normalized = value.trim();
    if (normalized.length === 0 || normalized.length > MAX_NAME_LENGTH) {
      throw new BadRequestException(`name must be 1-${MAX_NAME_LENGTH} characters`);
    }

    return normalized;
  }

  private parseKeyId(value: string): string {
    const normalized = value?.trim();
    if (!normalized) {
      throw new BadRequestException('id is required');
    }

    return normalized;
  }

  private optionalLimit(value: unknown, fieldName: string, max: number): number | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
      throw new BadRequestException(`${fieldName} must be an integer between 0 and ${max}`);
    }

    return value;
  }

  private optionalBoolean(value: unknown, fieldName: string): boolean | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'boolean') {
      throw new BadRequestException(`${fieldName} must be a boolean`);
    }

    return value;
  }

  private audit(
    request: RequestWithAdminIdentity,
    action: AuditAction,
    result: 'ok' | 'error',
    details?: Record<string, unknown>,
  ): void {
    const requestIdHeader = request.headers['x-request-id'];
    const requestId = Array.isArray(requestIdHeader) ? requestIdHeader[0] : requestIdHeader;
    const payload = {
      event: 'admin_api_key_audit',
      action,
      result,
      adminIdentity: request.adminIdentity ?? 'unknown',
      ip: request.ip ?? 'unknown',
      requestId: requestId ?? null,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }

  private errorReason(error: unknown): string {
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  Logger,
  NotFoundException,
  Post,
  Query,
  Req,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';

import { AccessKeysService } from './access-keys.service';
import { AdminAuthGuard, RequestWithAdminIdentity } from './admin-auth.guard';
import { ENDPOINT_REGISTRY, RegisteredEndpoint } from './endpoint-registry';
import {
  InvalidScopeError,
  KeyNotFoundError,
  MalformedTokenError,
  StoreUnavailableError,
  TenantNotFoundError,
} from './errors';
import type { FieldPermission, KeyDescription, KeyRecord, RevokeResult, ScopeSpec } from './types';

type IssueKeyBody = {
  owner?: unknown;
  name?: unknown;
  kind?: unknown;
  endpoints?: unknown;
  operations?: unknown;
};

type TokenBody = {
  token?: unknown;
  requesterId?: unknown;
};

type AuditAction = 'issue' | 'list' | 'describe' | 'revoke';

@Controller('internal/access-keys')
@UseGuards(AdminAuthGuard)
export class AccessKeysAdminController {
  private readonly logger = new Logger(AccessKeysAdminController.name);

  constructor(private readonly accessKeysService: AccessKeysService) {}

  @Post()
  async issue(
    @Req() request: RequestWithAdminIdentity,
    @Body() body: IssueKeyBody,
  ): Promise<{ token: string; record: KeyRecord }> {
    const owner = this.parseRequiredString(body?.owner, 'owner');
    const scope = this.parseScopeSpec(body);

    try {
      const { token, record } = await this.accessKeysService.issueKey(owner, scope);
      this.audit(request, 'issue', 'ok', { keyId: record.id, kind: record.kind, owner });
      return { token, record };
    } catch (error) {
      this.audit(request, 'issue', 'error', { owner, reason: this.errorReason(error) });
      throw this.toHttpException(error);
    }
  }

  @Get()
  async list(
    @Req() request: RequestWithAdminIdentity,
    @Query('owner') owner: unknown,
  ): Promise<{ items: KeyDescription[] }> {
    const ownerId = this.parseRequiredString(owner, 'owner');

    try {
      const items = await this.accessKeysService.listKeys(ownerId);
      this.audit(request, 'list', 'ok', { owner: ownerId, count: items.length });
      return { items };
    } catch (error) {
      this.audit(request, 'list', 'error', { owner: ownerId, reason: this.errorReason(error) });
      throw this.toHttpException(error);
    }
  }

  @Get('endpoints')
  listEndpoints(): { items: readonly RegisteredEndpoint[] } {
    return { items: ENDPOINT_REGISTRY };
  }

  @Post('describe')
  @HttpCode(200)
  async describe(
    @Req() request: RequestWithAdminIdentity,
    @Body() body: TokenBody,
  ): Promise<KeyDescription> {
    const token = this.parseRequiredString(body?.token, 'token');
    const requesterId = this.parseRequiredString(body?.requesterId, 'requesterId');

    try {
      const description = await this.accessKeysService.describeKey(token, requesterId);
      this.audit(request, 'describe', 'ok', { keyId: description.id });
      return description;
    } catch (error) {
      this.audit(request, 'describe', 'error', { reason: this.errorReason(error) });
      throw this.toHttpException(error);
    }
  }

  @Post('revoke')
  @HttpCode(200)
  async revoke(
    @Req() request: RequestWithAdminIdentity,
    @Body() body: TokenBody,
  ): Promise<{ ok: true }> {
    const token = this.parseRequiredString(body?.token, 'token');

    let result: RevokeResult;
    try {
      result = await this.accessKeysService.revoke(token);
    } catch (error) {
      this.audit(request, 'revoke', 'error', { reason: this.errorReason(error) });
      throw this.toHttpException(error);
    }

    if (result === 'not-found') {
      this.audit(request, 'revoke', 'error', { reason: 'NotFound' });
      throw new NotFoundException('API key not found');
    }

    this.audit(request, 'revoke', 'ok');
    return { ok: true };
  }

  private parseScopeSpec(body: IssueKeyBody): ScopeSpec {
    const name = this.parseRequiredString(body?.name, 'name');

    if (body?.kind === 'endpoint') {
      return {
        kind: 'endpoint',
        name,
        endpoints: this.parseStringArray(body.endpoints, 'endpoints'),
      };
    }

    if (body?.kind === 'query') {
      return { kind: 'query', name, operations: this.parseOperations(body.operations) };
    }

    throw new BadRequestException('kind must be one of: endpoint, query');
  }

  private parseOperations(value: unknown): FieldPermission[] {
    if (!Array.isArray(value)) {
      throw new BadRequestException('operations must be an array');
    }

    return value.map((item: unknown, index) => {
      if (typeof item !== 'object' || item === null || Array.isArray(item)) {
        throw new BadRequestException(`operations[${index}] must be an object`);
      }
      const entry: Record<string, unknown> = { ...item };
      return {
        operationName: this.parseRequiredString(
          entry.operationName,
          `operations[${index}].operationName`,
        ),
        allowedFields: this.parseStringArray(
          entry.allowedFields,
          `operations[${index}].allowedFields`,
        ),
      };
    });
  }

  private parseStringArray(value: unknown, fieldName: string): string[] {
    if (!Array.isArray(value)) {
      throw new BadRequestException(`${fieldName} must be an array of strings`);
    }

    return value.map((item: unknown) => {
      if (typeof item !== 'string') {
        throw new BadRequestException(`${fieldName} must be an array of strings`);
      }
      return item;
    });
  }

  private parseRequiredString(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }

    const normalized = value.trim();
    if (normalized.length === 0) {
      throw new BadRequestException(`${fieldName} is required`);
    }

    return normalized;
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof InvalidScopeError || error instanceof MalformedTokenError) {
      return new BadRequestException(error.message);
    }
    if (error instanceof TenantNotFoundError) {
      return new NotFoundException('Owner has no tenant assignment');
    }
    if (error instanceof KeyNotFoundError) {
      return new NotFoundException('API key not found');
    }
    if (error instanceof StoreUnavailableError) {
      return new ServiceUnavailableException('Access key backend unavailable');
    }
    return error;
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
      event: 'admin_access_key_audit',
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

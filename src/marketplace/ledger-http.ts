import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { ItemKind, ItemRef, LedgerErrorKind } from './engine';
import type { LedgerResult } from './marketplace.service';

const EXCEPTION_BY_KIND: Record<
  LedgerErrorKind,
  new (message: string) => HttpException
> = {
  NotFound: NotFoundException,
  InvalidState: ConflictException,
  Unauthorized: ForbiddenException,
  InsufficientFunds: UnprocessableEntityException,
  IneligibleAsset: BadRequestException,
  InvalidParameters: BadRequestException,
  TransferFailure: BadGatewayException,
};

export function toHttpException(kind: LedgerErrorKind, reason: string): HttpException {
  return new EXCEPTION_BY_KIND[kind](reason);
}

/** Value of a successful result; the mapped HTTP exception otherwise. */
export function unwrap<T>(result: LedgerResult<T>): T {
  if (!result.ok) throw toHttpException(result.kind, result.reason);
  return result.value;
}

/* ------------------------------------------------------------------ */
/*  REQUEST PARSING                                                    */
/* ------------------------------------------------------------------ */

const DECIMAL = /^\d+$/;

/** Amounts travel as non-negative decimal strings. */
export function parseAmount(raw: unknown, field: string, fallback?: bigint): bigint {
  if (raw === undefined && fallback !== undefined) return fallback;
  if (typeof raw === 'string' && DECIMAL.test(raw)) return BigInt(raw);
  if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) {
    return BigInt(raw);
  }
  throw new BadRequestException(`${field} must be a non-negative integer string`);
}

/** Unix seconds or a record id. */
export function parseInteger(raw: unknown, field: string): number {
  const value = typeof raw === 'string' && DECIMAL.test(raw) ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new BadRequestException(`${field} must be a non-negative integer`);
  }
  return value;
}

export function parseAccount(raw: unknown, field: string): string {
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new BadRequestException(`${field} required`);
  }
  return raw.trim();
}

export function parseBoolean(raw: unknown, field: string): boolean {
  if (typeof raw !== 'boolean') {
    throw new BadRequestException(`${field} must be true or false`);
  }
  return raw;
}

function parseKind(raw: unknown): ItemKind {
  if (raw === 'UNIQUE' || raw === 'QUANTITY') return raw;
  throw new BadRequestException('item.kind must be UNIQUE or QUANTITY');
}

export interface ItemBody {
  contract?: unknown;
  tokenId?: unknown;
  kind?: unknown;
}

export function parseItem(raw: ItemBody | undefined): ItemRef {
  if (!raw) throw new BadRequestException('item required');
  return {
    contract: parseAccount(raw.contract, 'item.contract'),
    tokenId: parseAccount(raw.tokenId, 'item.tokenId'),
    kind: parseKind(raw.kind),
  };
}

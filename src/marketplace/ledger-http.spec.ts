import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { parseAmount, parseInteger, parseItem, toHttpException, unwrap } from './ledger-http';

describe('ledger-http', () => {
  it.each([
    ['NotFound', NotFoundException],
    ['InvalidState', ConflictException],
    ['Unauthorized', ForbiddenException],
    ['InsufficientFunds', UnprocessableEntityException],
    ['IneligibleAsset', BadRequestException],
    ['InvalidParameters', BadRequestException],
    ['TransferFailure', BadGatewayException],
  ] as const)('maps %s to %p', (kind, exception) => {
    const err = toHttpException(kind, 'because');
    expect(err).toBeInstanceOf(exception);
    expect(err.message).toBe('because');
  });

  it('unwraps a successful result and throws a rejection', () => {
    expect(unwrap({ ok: true, value: 7 })).toBe(7);
    expect(() =>
      unwrap({ ok: false, kind: 'InvalidState', reason: 'Sale 1 is ENDED' }),
    ).toThrow(ConflictException);
  });

  it('parses amounts beyond the safe integer range', () => {
    expect(parseAmount('123456789012345678901234567890', 'price')).toBe(
      123456789012345678901234567890n,
    );
    expect(parseAmount(undefined, 'quantity', 1n)).toBe(1n);
    expect(() => parseAmount('1.5', 'price')).toThrow(
      'price must be a non-negative integer string',
    );
    expect(() => parseAmount(undefined, 'price')).toThrow(BadRequestException);
  });

  it('parses times and item references', () => {
    expect(parseInteger('1700000000', 'startTime')).toBe(1_700_000_000);
    expect(() => parseInteger(-1, 'startTime')).toThrow(
      'startTime must be a non-negative integer',
    );
    expect(parseItem({ contract: '0xart', tokenId: '4', kind: 'QUANTITY' })).toEqual({
      contract: '0xart',
      tokenId: '4',
      kind: 'QUANTITY',
    });
    expect(() => parseItem({ contract: '0xart', tokenId: '4', kind: 'ERC721' })).toThrow(
      'item.kind must be UNIQUE or QUANTITY',
    );
  });
});

import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
} from '@nestjs/websockets';
import { BadRequestException, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Server, Socket } from 'socket.io';
import { bearerToken, verifyClerkSubject } from '../auth/clerk-token';
import { UserService } from '../user/user.service';
import { describeError } from './engine';
import { parseAmount } from './ledger-http';
import {
  MarketplaceService,
  type LedgerEventNotice,
} from './marketplace.service';

interface SocketSession {
  clerkId: string;
  account: string;
}

interface WatchPayload {
  saleId?: unknown;
  auctionId?: unknown;
}

interface PlaceBidPayload {
  auctionId?: unknown;
  amountFromBalance?: unknown;
  externalFunds?: unknown;
  value?: unknown;
  idempotencyKey?: unknown;
}

function recordId(raw: unknown): number | null {
  return typeof raw === 'number' && Number.isSafeInteger(raw) && raw > 0
    ? raw
    : null;
}

@WebSocketGateway({ cors: { origin: '*' } })
export class MarketplaceGateway implements OnModuleInit {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(MarketplaceGateway.name);
  private readonly sessionBySocketId = new Map<string, SocketSession>();

  constructor(
    private readonly marketplace: MarketplaceService,
    private readonly userService: UserService,
    private readonly config: ConfigService,
  ) {}

  async handleConnection(client: Socket): Promise<void> {
    const token = this.extractToken(client);
    const secretKey = this.config.get<string>('clerk.secretKey');
    if (!token || !secretKey) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return;
    }

    try {
      const clerkId = await verifyClerkSubject(token, secretKey);
      const account = await this.userService.accountFor(clerkId);
      this.sessionBySocketId.set(client.id, { clerkId, account });
      await client.join(this.marketplace.getAccountRoom(account));
      this.logger.debug(`Socket authenticated id=${client.id} clerk=${clerkId}`);
    } catch (e) {
      this.logger.warn(`Socket auth failed: ${describeError(e)}`);
      client.emit('auth_error', { message: 'Authentication failed' });
      client.disconnect(true);
    }
  }

  handleDisconnect(client: Socket): void {
    this.sessionBySocketId.delete(client.id);
  }

  private extractToken(client: Socket): string | null {
    const authToken: unknown = client.handshake.auth?.token;
    if (typeof authToken === 'string' && authToken.trim()) {
      return authToken.trim();
    }
    return bearerToken(client.handshake.headers?.authorization);
  }

  private requireSession(client: Socket): SocketSession | null {
    const session = this.sessionBySocketId.get(client.id) ?? null;
    if (!session) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return null;
    }
    return session;
  }

  onModuleInit(): void {
    this.marketplace
      .getEventEmitter()
      .on('ledgerEvent', (notice: LedgerEventNotice) => {
        if (notice.rooms.length === 0) return;
        this.server.to(notice.rooms).emit('ledger_event', notice.event);
      });
  }

  @SubscribeMessage('watch_sale')
  async handleWatchSale(client: Socket, payload: WatchPayload): Promise<void> {
    if (!this.requireSession(client)) return;

    const saleId = recordId(payload?.saleId);
    if (saleId === null) {
      client.emit('error', { message: 'saleId required' });
      return;
    }
    await client.join(this.marketplace.getSaleRoom(saleId));
    const result = this.marketplace.getSale(saleId);
    client.emit('sale_state', result.ok ? result.value : { error: result.reason });
  }

  @SubscribeMessage('watch_auction')
  async handleWatchAuction(client: Socket, payload: WatchPayload): Promise<void> {
    if (!this.requireSession(client)) return;

    const auctionId = recordId(payload?.auctionId);
    if (auctionId === null) {
      client.emit('error', { message: 'auctionId required' });
      return;
    }
    await client.join(this.marketplace.getAuctionRoom(auctionId));
    const result = this.marketplace.getAuction(auctionId);
    client.emit('auction_state', result.ok ? result.value : { error: result.reason });
  }

  @SubscribeMessage('unwatch')
  async handleUnwatch(client: Socket, payload: WatchPayload): Promise<void> {
    if (!this.requireSession(client)) return;

    const saleId = recordId(payload?.saleId);
    const auctionId = recordId(payload?.auctionId);
    if (saleId !== null) await client.leave(this.marketplace.getSaleRoom(saleId));
    if (auctionId !== null) {
      await client.leave(this.marketplace.getAuctionRoom(auctionId));
    }
  }

  @SubscribeMessage('place_bid')
  async handlePlaceBid(client: Socket, payload: PlaceBidPayload): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const auctionId = recordId(payload?.auctionId);
    if (auctionId === null) {
      client.emit('bid_result', {
        ok: false,
        kind: 'InvalidParameters',
        reason: 'auctionId required',
      });
      return;
    }

    let amounts: { amountFromBalance: bigint; externalFunds: bigint; value: bigint };
    try {
      amounts = {
        amountFromBalance: parseAmount(payload.amountFromBalance, 'amountFromBalance', 0n),
        externalFunds: parseAmount(payload.externalFunds, 'externalFunds', 0n),
        value: parseAmount(payload.value, 'value', 0n),
      };
    } catch (err) {
      if (!(err instanceof BadRequestException)) throw err;
      client.emit('bid_result', {
        ok: false,
        kind: 'InvalidParameters',
        reason: err.message,
      });
      return;
    }

    const result = await this.marketplace.placeBid(
      session.account,
      { auctionId, ...amounts },
      typeof payload.idempotencyKey === 'string' ? payload.idempotencyKey : undefined,
    );
    client.emit('bid_result', result);
  }
}

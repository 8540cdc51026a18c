import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  Headers,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ClerkId } from '../auth/decorators/clerk-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { UserService } from '../user/user.service';
import { parseAmount, parseBoolean, unwrap } from './ledger-http';
import { MarketplaceService } from './marketplace.service';

const MAX_EVENT_PAGE = 500;

@Controller('vault')
export class VaultController {
  constructor(
    private readonly marketplace: MarketplaceService,
    private readonly users: UserService,
  ) {}

  @Get('balances/:account')
  balances(@Param('account') account: string) {
    return this.marketplace.balancesOf(account);
  }

  @Get('me')
  @UseGuards(ClerkAuthGuard)
  async mine(@ClerkId() clerkId: string) {
    const account = await this.users.accountFor(clerkId);
    return { account, balances: this.marketplace.balancesOf(account) };
  }

  /** Pays the caller's whole balance in one currency out to them. */
  @Post('claim/:currency')
  @UseGuards(ClerkAuthGuard)
  async claim(
    @ClerkId() clerkId: string,
    @Param('currency') currency: string,
    @Headers('idempotency-key') idempotencyKey?: string,
  ) {
    const account = await this.users.accountFor(clerkId);
    return unwrap(await this.marketplace.claim(account, currency, idempotencyKey));
  }

  /* ----------------- wallet on the in-process rails ----------------- */

  @Get('wallet/:currency')
  @UseGuards(ClerkAuthGuard)
  async wallet(@ClerkId() clerkId: string, @Param('currency') currency: string) {
    const account = await this.users.accountFor(clerkId);
    return this.marketplace.walletOf(account, currency);
  }

  /** Lets the marketplace custody account move the caller's items of a collection. */
  @Post('wallet/collections/:contract/approval')
  @UseGuards(ClerkAuthGuard)
  async approveCustody(
    @ClerkId() clerkId: string,
    @Param('contract') contract: string,
    @Body('approved') approved: unknown,
  ) {
    const owner = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.approveCustody(
        owner,
        contract,
        approved === undefined ? true : parseBoolean(approved, 'approved'),
      ),
    );
  }

  @Post('wallet/:currency/allowance')
  @UseGuards(ClerkAuthGuard)
  async approveSpending(
    @ClerkId() clerkId: string,
    @Param('currency') currency: string,
    @Body('amount') amount: unknown,
  ) {
    const owner = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.approveSpending(owner, currency, parseAmount(amount, 'amount')),
    );
  }
}

@Controller('events')
export class LedgerEventsController {
  constructor(private readonly marketplace: MarketplaceService) {}

  /** Committed ledger events after the given id, oldest first. */
  @Get()
  list(
    @Query('after', new DefaultValuePipe(0), ParseIntPipe) after: number,
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ) {
    return this.marketplace.listEvents(after, Math.min(Math.max(limit, 1), MAX_EVENT_PAGE));
  }
}

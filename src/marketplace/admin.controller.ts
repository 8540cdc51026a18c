import { Body, Controller, Get, Param, Post, Put, UseGuards } from '@nestjs/common';
import { ClerkId } from '../auth/decorators/clerk-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { UserService } from '../user/user.service';
import {
  parseAccount,
  parseAmount,
  parseBoolean,
  parseItem,
  unwrap,
  type ItemBody,
} from './ledger-http';
import { MarketplaceService } from './marketplace.service';

interface CollectionBody {
  kind?: unknown;
  supportsRoyalties?: unknown;
  royaltyReceiver?: unknown;
  royaltyBps?: unknown;
}

/**
 * Administrator routes. The engine checks the role on every call, so the
 * guard here only establishes who is calling.
 */
@Controller('admin')
@UseGuards(ClerkAuthGuard)
export class AdminController {
  constructor(
    private readonly marketplace: MarketplaceService,
    private readonly users: UserService,
  ) {}

  @Get('fee')
  fee() {
    return this.marketplace.getFeeConfig();
  }

  @Put('fee')
  async setFee(
    @ClerkId() clerkId: string,
    @Body() body: { rate?: unknown; scale?: unknown },
  ) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.setFee(
        caller,
        parseAmount(body.rate, 'rate'),
        parseAmount(body.scale, 'scale'),
      ),
    );
  }

  @Put('fee/recipient')
  async setFeeRecipient(@ClerkId() clerkId: string, @Body('recipient') recipient: unknown) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.setFeeRecipient(caller, parseAccount(recipient, 'recipient')),
    );
  }

  @Put('listing-contracts/:contract')
  async setListingContract(
    @ClerkId() clerkId: string,
    @Param('contract') contract: string,
    @Body('approved') approved: unknown,
  ) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.setListingContractApproval(
        caller,
        contract,
        parseBoolean(approved, 'approved'),
      ),
    );
  }

  @Put('currencies/:currency')
  async setCurrency(
    @ClerkId() clerkId: string,
    @Param('currency') currency: string,
    @Body('approved') approved: unknown,
  ) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.setCurrencyApproval(
        caller,
        currency,
        parseBoolean(approved, 'approved'),
      ),
    );
  }

  /** Irreversible. */
  @Post('currencies/approve-all')
  async approveAllCurrencies(@ClerkId() clerkId: string) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(await this.marketplace.approveAllCurrencies(caller));
  }

  /* ------------------ sandbox chain administration ------------------ */

  @Post('sandbox/collections/:contract')
  async deployCollection(
    @ClerkId() clerkId: string,
    @Param('contract') contract: string,
    @Body() body: CollectionBody,
  ) {
    const caller = await this.users.accountFor(clerkId);
    const { kind } = parseItem({ contract, tokenId: '0', kind: body.kind });
    return unwrap(
      await this.marketplace.deployCollection(caller, contract, {
        kind,
        supportsRoyalties:
          body.supportsRoyalties === undefined
            ? true
            : parseBoolean(body.supportsRoyalties, 'supportsRoyalties'),
        royaltyReceiver:
          body.royaltyReceiver === undefined
            ? undefined
            : parseAccount(body.royaltyReceiver, 'royaltyReceiver'),
        royaltyBps: parseAmount(body.royaltyBps, 'royaltyBps', 0n),
      }),
    );
  }

  @Post('sandbox/mint')
  async mint(
    @ClerkId() clerkId: string,
    @Body() body: { item?: ItemBody; to?: unknown; quantity?: unknown },
  ) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.mintItem(
        caller,
        parseItem(body.item),
        parseAccount(body.to, 'to'),
        parseAmount(body.quantity, 'quantity', 1n),
      ),
    );
  }

  @Post('sandbox/fund')
  async fund(
    @ClerkId() clerkId: string,
    @Body() body: { currency?: unknown; account?: unknown; amount?: unknown },
  ) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.fundAccount(
        caller,
        parseAccount(body.currency, 'currency'),
        parseAccount(body.account, 'account'),
        parseAmount(body.amount, 'amount'),
      ),
    );
  }
}

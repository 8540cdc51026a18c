import {
  Body,
  Controller,
  Get,
  Headers,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ClerkId } from '../auth/decorators/clerk-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { UserService } from '../user/user.service';
import {
  parseAccount,
  parseAmount,
  parseInteger,
  parseItem,
  unwrap,
  type ItemBody,
} from './ledger-http';
import { MarketplaceService } from './marketplace.service';

interface CreateAuctionBody {
  item?: ItemBody;
  quantity?: unknown;
  reservePrice?: unknown;
  currency?: unknown;
  startTime?: unknown;
  endTime?: unknown;
}

export interface BidBody {
  amountFromBalance?: unknown;
  externalFunds?: unknown;
  value?: unknown;
}

@Controller('auctions')
export class AuctionsController {
  constructor(
    private readonly marketplace: MarketplaceService,
    private readonly users: UserService,
  ) {}

  @Get()
  list() {
    return this.marketplace.listAuctions();
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return unwrap(this.marketplace.getAuction(id));
  }

  @Get(':id/bids/:bidder')
  getBid(@Param('id', ParseIntPipe) id: number, @Param('bidder') bidder: string) {
    return unwrap(this.marketplace.getBid(id, bidder));
  }

  @Post()
  @UseGuards(ClerkAuthGuard)
  async create(@ClerkId() clerkId: string, @Body() body: CreateAuctionBody) {
    const seller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.createAuction(seller, {
        item: parseItem(body.item),
        quantity: parseAmount(body.quantity, 'quantity', 1n),
        reservePrice: parseAmount(body.reservePrice, 'reservePrice', 0n),
        currency: parseAccount(body.currency, 'currency'),
        startTime: parseInteger(body.startTime, 'startTime'),
        endTime: parseInteger(body.endTime, 'endTime'),
      }),
    );
  }

  @Post(':id/bids')
  @UseGuards(ClerkAuthGuard)
  async bid(
    @ClerkId() clerkId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: BidBody,
    @Headers('idempotency-key') idempotencyKey?: string,
  ) {
    const bidder = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.placeBid(
        bidder,
        {
          auctionId: id,
          amountFromBalance: parseAmount(body.amountFromBalance, 'amountFromBalance', 0n),
          externalFunds: parseAmount(body.externalFunds, 'externalFunds', 0n),
          value: parseAmount(body.value, 'value', 0n),
        },
        idempotencyKey,
      ),
    );
  }

  @Post(':id/cancel')
  @UseGuards(ClerkAuthGuard)
  async cancel(@ClerkId() clerkId: string, @Param('id', ParseIntPipe) id: number) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(await this.marketplace.cancelAuction(caller, id));
  }

  @Post(':id/settle')
  @UseGuards(ClerkAuthGuard)
  async settle(@ClerkId() clerkId: string, @Param('id', ParseIntPipe) id: number) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(await this.marketplace.settleAuction(caller, id));
  }
}

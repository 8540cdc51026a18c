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

interface CreateSaleBody {
  item?: ItemBody;
  amount?: unknown;
  price?: unknown;
  currency?: unknown;
  startTime?: unknown;
  endTime?: unknown;
}

interface BuyBody {
  recipient?: unknown;
  quantity?: unknown;
  amountFromBalance?: unknown;
  value?: unknown;
}

@Controller('sales')
export class SalesController {
  constructor(
    private readonly marketplace: MarketplaceService,
    private readonly users: UserService,
  ) {}

  @Get()
  list() {
    return this.marketplace.listSales();
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return unwrap(this.marketplace.getSale(id));
  }

  @Get(':id/purchases/:buyer')
  purchasedBy(@Param('id', ParseIntPipe) id: number, @Param('buyer') buyer: string) {
    return unwrap(this.marketplace.purchasedBy(id, buyer));
  }

  @Post()
  @UseGuards(ClerkAuthGuard)
  async create(@ClerkId() clerkId: string, @Body() body: CreateSaleBody) {
    const seller = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.createSale(seller, {
        item: parseItem(body.item),
        amount: parseAmount(body.amount, 'amount', 1n),
        price: parseAmount(body.price, 'price'),
        currency: parseAccount(body.currency, 'currency'),
        startTime: parseInteger(body.startTime, 'startTime'),
        endTime: parseInteger(body.endTime, 'endTime'),
      }),
    );
  }

  @Post(':id/buy')
  @UseGuards(ClerkAuthGuard)
  async buy(
    @ClerkId() clerkId: string,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: BuyBody,
    @Headers('idempotency-key') idempotencyKey?: string,
  ) {
    const buyer = await this.users.accountFor(clerkId);
    return unwrap(
      await this.marketplace.buy(
        buyer,
        {
          saleId: id,
          recipient:
            body.recipient === undefined
              ? undefined
              : parseAccount(body.recipient, 'recipient'),
          quantity: parseAmount(body.quantity, 'quantity', 1n),
          amountFromBalance: parseAmount(body.amountFromBalance, 'amountFromBalance', 0n),
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
    return unwrap(await this.marketplace.cancelSale(caller, id));
  }

  /** Returns unsold stock of a cancelled or ended sale to its seller. */
  @Post(':id/reclaim')
  @UseGuards(ClerkAuthGuard)
  async reclaim(@ClerkId() clerkId: string, @Param('id', ParseIntPipe) id: number) {
    const caller = await this.users.accountFor(clerkId);
    return unwrap(await this.marketplace.claimSaleItems(caller, id));
  }
}

import { Module } from '@nestjs/common';
import { AdminController } from './admin.controller';
import { AuctionsController } from './auctions.controller';
import { MarketplacePersistenceService } from './marketplace-persistence.service';
import { MarketplaceGateway } from './marketplace.gateway';
import { marketplaceRuntimeProvider } from './marketplace.providers';
import { MarketplaceService } from './marketplace.service';
import { SalesController } from './sales.controller';
import { LedgerEventsController, VaultController } from './vault.controller';

@Module({
  controllers: [
    SalesController,
    AuctionsController,
    VaultController,
    LedgerEventsController,
    AdminController,
  ],
  providers: [
    marketplaceRuntimeProvider,
    MarketplaceService,
    MarketplacePersistenceService,
    MarketplaceGateway,
  ],
  exports: [MarketplaceService],
})
export class MarketplaceModule {}

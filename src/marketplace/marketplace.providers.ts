import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { MarketplaceSettings } from '../config/configuration';
import {
  Marketplace,
  SimulatedItemContracts,
  SimulatedPaymentRails,
  systemClock,
  type Clock,
} from './engine';

export const MARKETPLACE_RUNTIME = Symbol('MARKETPLACE_RUNTIME');

/**
 * The ledger engine together with the in-process item contracts and
 * payment rails it settles against.
 */
export interface MarketplaceRuntime {
  market: Marketplace;
  items: SimulatedItemContracts;
  rails: SimulatedPaymentRails;
}

export function createMarketplaceRuntime(
  settings: MarketplaceSettings,
  clock: Clock = systemClock,
): MarketplaceRuntime {
  const items = new SimulatedItemContracts(settings.custodyAddress);
  const rails = new SimulatedPaymentRails(settings.custodyAddress);
  const admins = new Set(settings.admins);
  const market = new Marketplace({
    salesAddress: settings.salesAddress,
    auctionsAddress: settings.auctionsAddress,
    custody: settings.custodyAddress,
    feeRecipient: settings.feeRecipient,
    feeRate: settings.feeRate,
    feeScale: settings.feeScale,
    clock,
    access: { isAdmin: (account) => admins.has(account) },
    items,
    rails,
    participants: [items, rails],
  });
  return { market, items, rails };
}

export const marketplaceRuntimeProvider: FactoryProvider<MarketplaceRuntime> = {
  provide: MARKETPLACE_RUNTIME,
  inject: [ConfigService],
  useFactory: (config: ConfigService) =>
    createMarketplaceRuntime(
      config.getOrThrow<MarketplaceSettings>('marketplace'),
    ),
};

function list(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export interface MarketplaceSettings {
  admins: string[];
  feeRecipient: string;
  feeRate: bigint;
  feeScale: bigint;
  salesAddress: string;
  auctionsAddress: string;
  custodyAddress: string;
}

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),
  corsOrigins: list(process.env.CORS_ORIGIN),
  database: {
    url: process.env.DATABASE_URL ?? 'postgresql://localhost:5432/marketplace',
  },
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  clerk: {
    secretKey: process.env.CLERK_SECRET_KEY,
  },
  marketplace: {
    admins: list(process.env.MARKETPLACE_ADMINS),
    feeRecipient: process.env.MARKETPLACE_FEE_RECIPIENT ?? 'treasury',
    feeRate: BigInt(process.env.MARKETPLACE_FEE_RATE ?? '300'),
    feeScale: BigInt(process.env.MARKETPLACE_FEE_SCALE ?? '10000'),
    salesAddress: process.env.MARKETPLACE_SALES_ADDRESS ?? 'marketplace-sales',
    auctionsAddress:
      process.env.MARKETPLACE_AUCTIONS_ADDRESS ?? 'marketplace-auctions',
    custodyAddress:
      process.env.MARKETPLACE_CUSTODY_ADDRESS ?? 'marketplace-custody',
  } satisfies MarketplaceSettings,
});

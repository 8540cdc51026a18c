import { Global, Module } from '@nestjs/common';
import { ClerkAuthGuard } from './guards/clerk-auth.guard';

/** Makes `ClerkAuthGuard` injectable from every feature module. */
@Global()
@Module({
  providers: [ClerkAuthGuard],
  exports: [ClerkAuthGuard],
})
export class AuthModule {}

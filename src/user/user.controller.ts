import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Logger,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ClerkId } from '../auth/decorators/clerk-id.decorator';
import { ClerkAuthGuard } from '../auth/guards/clerk-auth.guard';
import { UserService, type User } from './user.service';

/** The signed-in user as the marketplace sees them. */
export interface AccountProfile {
  /** Address their sales, bids and vault balances are recorded under. */
  account: string;
  displayName: string;
  joinedAt: string;
}

function toProfile(user: User): AccountProfile {
  return {
    account: user.id,
    displayName: user.displayName,
    joinedAt: user.createdAt.toISOString(),
  };
}

function optionalName(raw: unknown): string | undefined {
  return typeof raw === 'string' ? raw : undefined;
}

@Controller('users')
@UseGuards(ClerkAuthGuard)
export class UserController {
  private readonly logger = new Logger(UserController.name);

  constructor(private readonly users: UserService) {}

  /** Opens a ledger account on first sign-in. */
  @Post('sync')
  async sync(
    @ClerkId() clerkId: string,
    @Body('displayName') displayName?: unknown,
  ): Promise<AccountProfile> {
    const user = await this.users.syncFromClerk(clerkId, optionalName(displayName));
    this.logger.debug(`Account ${user.id} linked to ${clerkId}`);
    return toProfile(user);
  }

  @Get('me')
  async me(@ClerkId() clerkId: string): Promise<AccountProfile> {
    return toProfile(await this.users.syncFromClerk(clerkId));
  }

  @Patch('me')
  async rename(
    @ClerkId() clerkId: string,
    @Body('displayName') displayName?: unknown,
  ): Promise<AccountProfile> {
    const name = optionalName(displayName)?.trim();
    if (!name) throw new BadRequestException('displayName required');
    const user = await this.users.updateDisplayNameFromClerk(clerkId, name);
    return toProfile(user);
  }
}

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentPrincipal } from '../../auth/decorators/current-principal.decorator';
import { RequireOperation } from '../../auth/decorators/require-operation.decorator';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { LedgerPolicyGuard } from '../../auth/guards/ledger-policy.guard';
import { Principal } from '../../auth/interfaces/principal.interface';
import { LedgerOperation } from '../../common/enums/ledger-operation.enum';
import { UserKind } from '../../common/enums/user-kind.enum';
import { AddPrepaidUserDto } from '../../dto/add-prepaid-user.dto';
import { UserMoneyDto } from '../../dto/user-money.dto';
import { LedgerService } from '../../services/ledger/ledger.service';
import {
  PrepaidUserView,
  toPostpaidView,
  toPrepaidView,
} from '../../services/ledger/ledger.views';

/**
 * UsersController
 *
 * Self-service endpoints of logged-in users: own balance and own prepaid users
 */
@ApiTags('Users')
@ApiBearerAuth()
@Controller()
@UseGuards(JwtAuthGuard, LedgerPolicyGuard)
export class UsersController {
  constructor(private readonly ledgerService: LedgerService) {}

  /**
   * GET /me
   * Own record; members also get their prepaid users
   */
  @Get('me')
  @ApiOperation({ summary: 'Current user', description: 'Returns the balance of the logged-in user' })
  @ApiResponse({ status: 200, description: 'Profile retrieved successfully' })
  @ApiResponse({ status: 401, description: 'Unauthorized' })
  async getMe(@CurrentPrincipal() principal: Principal | null) {
    const profile = await this.ledgerService.getProfile(principal);

    if (profile.kind === UserKind.PREPAID) {
      return { kind: profile.kind, user: toPrepaidView(profile.user) };
    }
    return {
      kind: profile.kind,
      user: toPostpaidView(profile.user),
      prepaidUsers: profile.prepaidUsers.map(toPrepaidView),
    };
  }

  @Get('prepaid_users')
  @RequireOperation(LedgerOperation.VIEW_OWN_PREPAID)
  @ApiOperation({ summary: 'Own prepaid users' })
  @ApiResponse({ status: 200, type: [PrepaidUserView] })
  @ApiResponse({ status: 403, description: 'Not a member' })
  async getPrepaidUsers(
    @CurrentPrincipal() principal: Principal | null,
  ): Promise<PrepaidUserView[]> {
    const users = await this.ledgerService.listOwnPrepaidUsers(principal);
    return users.map(toPrepaidView);
  }

  @Post('add_prepaid_user')
  @HttpCode(HttpStatus.CREATED)
  @RequireOperation(LedgerOperation.ADD_PREPAID_USER)
  @ApiOperation({
    summary: 'Add a prepaid user',
    description: 'Creates a prepaid user owned by the caller and returns its secret user key.',
  })
  @ApiResponse({ status: 201, type: PrepaidUserView })
  @ApiResponse({ status: 409, description: 'Username already taken' })
  async addPrepaidUser(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: AddPrepaidUserDto,
  ): Promise<PrepaidUserView> {
    const user = await this.ledgerService.addPrepaidUser(
      principal,
      dto.username,
      dto.startMoney,
    );
    return toPrepaidView(user);
  }

  @Post('add_money_prepaid_user')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.ADD_MONEY_PREPAID)
  @ApiOperation({
    summary: 'Top up a prepaid user',
    description: 'Owners top up their own prepaid users, admins any prepaid user.',
  })
  @ApiResponse({ status: 200, type: PrepaidUserView })
  @ApiResponse({ status: 403, description: 'Prepaid user belongs to someone else' })
  @ApiResponse({ status: 404, description: 'Prepaid user not found' })
  async addMoneyPrepaidUser(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: UserMoneyDto,
  ): Promise<PrepaidUserView> {
    const user = await this.ledgerService.addMoneyPrepaid(principal, dto.username, dto.money);
    return toPrepaidView(user);
  }
}

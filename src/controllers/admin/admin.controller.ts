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
import { SetMoneyPrepaidDto } from '../../dto/set-money-prepaid.dto';
import { UserMoneyDto } from '../../dto/user-money.dto';
import { UsernameDto } from '../../dto/username.dto';
import { LedgerService } from '../../services/ledger/ledger.service';
import {
  PostpaidUserView,
  PrepaidUserView,
  toPostpaidView,
  toPrepaidView,
} from '../../services/ledger/ledger.views';

/**
 * AdminController
 *
 * Ledger administration, admin group only
 */
@ApiTags('Admin')
@ApiBearerAuth()
@Controller()
@UseGuards(JwtAuthGuard, LedgerPolicyGuard)
export class AdminController {
  constructor(private readonly ledgerService: LedgerService) {}

  /**
   * GET /stats
   * All postpaid and prepaid users
   */
  @Get('stats')
  @RequireOperation(LedgerOperation.VIEW_LEDGER)
  @ApiOperation({ summary: 'Ledger overview', description: 'Returns every postpaid and prepaid user.' })
  @ApiResponse({ status: 200, description: 'Ledger retrieved successfully' })
  @ApiResponse({ status: 401, description: 'Unauthorized' })
  @ApiResponse({ status: 403, description: 'Not an admin' })
  async getStats(@CurrentPrincipal() principal: Principal | null) {
    const stats = await this.ledgerService.getStats(principal);
    return {
      postpaidUsers: stats.postpaidUsers.map(toPostpaidView),
      prepaidUsers: stats.prepaidUsers.map(toPrepaidView),
    };
  }

  /**
   * POST /payup
   * Moves money from the admin's own balance to the user, e.g. when the
   * user pays cash to the admin
   */
  @Post('payup')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.PAYUP)
  @ApiOperation({ summary: 'Pay up', description: 'Credits the user and debits the admin by the same amount.' })
  @ApiResponse({ status: 200, description: 'Both updated balances' })
  @ApiResponse({ status: 404, description: 'User not found' })
  async payUp(@CurrentPrincipal() principal: Principal | null, @Body() dto: UserMoneyDto) {
    const { admin, target } = await this.ledgerService.payUp(principal, dto.username, dto.money);
    return { admin: toPostpaidView(admin), user: toPostpaidView(target) };
  }

  @Post('toggle_activated_user_postpaid')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.TOGGLE_ACTIVATED)
  @ApiOperation({ summary: 'Toggle activation of a postpaid user' })
  @ApiResponse({ status: 200, type: PostpaidUserView })
  async toggleActivatedPostpaid(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: UsernameDto,
  ): Promise<PostpaidUserView> {
    const user = await this.ledgerService.toggleActivated(
      principal,
      dto.username,
      UserKind.POSTPAID,
    );
    return toPostpaidView(user);
  }

  @Post('toggle_activated_user_prepaid')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.TOGGLE_ACTIVATED)
  @ApiOperation({ summary: 'Toggle activation of a prepaid user' })
  @ApiResponse({ status: 200, type: PrepaidUserView })
  async toggleActivatedPrepaid(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: UsernameDto,
  ): Promise<PrepaidUserView> {
    const user = await this.ledgerService.toggleActivated(
      principal,
      dto.username,
      UserKind.PREPAID,
    );
    return toPrepaidView(user);
  }

  @Post('set_money_postpaid')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.SET_MONEY)
  @ApiOperation({ summary: 'Set the balance of a postpaid user' })
  @ApiResponse({ status: 200, type: PostpaidUserView })
  async setMoneyPostpaid(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: UserMoneyDto,
  ): Promise<PostpaidUserView> {
    const user = await this.ledgerService.setMoneyPostpaid(principal, dto.username, dto.money);
    return toPostpaidView(user);
  }

  @Post('set_money_prepaid')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.SET_MONEY)
  @ApiOperation({
    summary: 'Set the balance of a prepaid user',
    description: 'Optionally moves the prepaid user to another owner.',
  })
  @ApiResponse({ status: 200, type: PrepaidUserView })
  async setMoneyPrepaid(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: SetMoneyPrepaidDto,
  ): Promise<PrepaidUserView> {
    const user = await this.ledgerService.setMoneyPrepaid(
      principal,
      dto.username,
      dto.money,
      dto.ownerUsername,
    );
    return toPrepaidView(user);
  }

  @Post('del_prepaid_user')
  @HttpCode(HttpStatus.OK)
  @RequireOperation(LedgerOperation.DELETE_PREPAID_USER)
  @ApiOperation({
    summary: 'Delete a prepaid user',
    description: 'The user key is retired and never issued again.',
  })
  @ApiResponse({ status: 200, description: 'Prepaid user deleted' })
  @ApiResponse({ status: 404, description: 'Prepaid user not found' })
  async deletePrepaidUser(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: UsernameDto,
  ) {
    await this.ledgerService.deletePrepaidUser(principal, dto.username);
    return { deleted: dto.username };
  }
}

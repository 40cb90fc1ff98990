import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentPrincipal } from '../../auth/decorators/current-principal.decorator';
import { OptionalJwtGuard } from '../../auth/guards/optional-jwt.guard';
import { Principal } from '../../auth/interfaces/principal.interface';
import { UserKind } from '../../common/enums/user-kind.enum';
import { RecordDrinkDto } from '../../dto/record-drink.dto';
import { DrinkTarget, LedgerService } from '../../services/ledger/ledger.service';
import { toPostpaidView, toPrepaidView } from '../../services/ledger/ledger.views';

/**
 * DrinksController
 *
 * Point of sale: one drink per request, charged at the configured price
 */
@ApiTags('Drinks')
@Controller()
export class DrinksController {
  private readonly priceCents: number;

  constructor(
    private readonly ledgerService: LedgerService,
    configService: ConfigService,
  ) {
    this.priceCents = configService.get<number>('ledger.drinkPriceCents', 100);
  }

  /**
   * POST /drink
   * With userKey: charges that prepaid user, no login needed.
   * Without: charges the logged-in user (postpaid member or prepaid session).
   */
  @Post('drink')
  @HttpCode(HttpStatus.OK)
  @UseGuards(OptionalJwtGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Record a drink',
    description:
      'Charges one drink to the prepaid user identified by userKey, or to the logged-in user.',
  })
  @ApiResponse({ status: 200, description: 'Drink recorded, returns the updated user' })
  @ApiResponse({ status: 401, description: 'Neither a login nor a user key' })
  @ApiResponse({ status: 403, description: 'User is deactivated' })
  @ApiResponse({ status: 404, description: 'Unknown user key' })
  async recordDrink(
    @CurrentPrincipal() principal: Principal | null,
    @Body() dto: RecordDrinkDto,
  ) {
    const target: DrinkTarget = dto.userKey
      ? { type: 'prepaid-key', userKey: dto.userKey }
      : principal?.kind === UserKind.PREPAID
        ? { type: 'self-prepaid' }
        : { type: 'self-postpaid' };

    const result = await this.ledgerService.recordDrink(principal, target, this.priceCents);

    return result.kind === UserKind.POSTPAID
      ? { kind: result.kind, user: toPostpaidView(result.user) }
      : { kind: result.kind, user: toPrepaidView(result.user) };
  }
}

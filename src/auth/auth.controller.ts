import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { PrepaidLoginDto } from '../dto/prepaid-login.dto';
import { toPrepaidView } from '../services/ledger/ledger.views';

/**
 * AuthController
 *
 * - POST /auth/prepaid - exchange a user key for a prepaid session token
 *
 * Member login happens at the identity provider, which issues the bearer token.
 */
@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('prepaid')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Prepaid login',
    description: 'Exchanges a prepaid user key for a bearer token that acts as that prepaid user.',
  })
  @ApiResponse({
    status: 200,
    description: 'Login successful',
    schema: {
      type: 'object',
      properties: {
        access_token: { type: 'string', example: 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9...' },
        user: { type: 'object' },
      },
    },
  })
  @ApiResponse({ status: 401, description: 'Invalid user key' })
  async loginPrepaid(@Body() dto: PrepaidLoginDto) {
    const { access_token, user } = await this.authService.loginPrepaid(dto.userKey);
    return { access_token, user: toPrepaidView(user) };
  }
}

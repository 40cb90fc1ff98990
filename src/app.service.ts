import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatCents } from './common/utils/money';
import { LedgerStore } from './services/ledger-store/ledger-store';

@Injectable()
export class AppService {
  constructor(
    private readonly store: LedgerStore,
    private readonly configService: ConfigService,
  ) {}

  getInfo() {
    return {
      name: 'Drinks Ledger API',
      drinkPrice: formatCents(this.configService.get<number>('ledger.drinkPriceCents', 100)),
      loginUrl: this.configService.get<string>('auth.loginUrl', '/login'),
      docs: '/api/docs',
    };
  }

  async getHealth() {
    const store = await this.store.healthCheck();
    return {
      status: store.connected ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      store,
    };
  }
}

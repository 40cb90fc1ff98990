import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { AdminController } from '../controllers/admin/admin.controller';
import { DrinksController } from '../controllers/drinks/drinks.controller';
import { UsersController } from '../controllers/users/users.controller';
import { LedgerModule } from '../services/ledger/ledger.module';

/**
 * ApiModule
 *
 * REST controllers of the ledger
 */
@Module({
  imports: [LedgerModule, AuthModule],
  controllers: [DrinksController, UsersController, AdminController],
})
export class ApiModule {}

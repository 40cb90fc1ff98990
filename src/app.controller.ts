import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({ summary: 'Service info', description: 'Drink price and where to log in' })
  getInfo() {
    return this.appService.getInfo();
  }

  @Get('health')
  @ApiOperation({ summary: 'Health check', description: 'Returns service and store health' })
  @ApiResponse({ status: 200, description: 'Service is up, see store.connected' })
  getHealth() {
    return this.appService.getHealth();
  }
}

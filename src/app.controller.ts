import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { FUND_CONFIG, FundConfig } from './config/fund.config';

@Controller()
export class AppController {
  constructor(@Inject(FUND_CONFIG) private readonly config: FundConfig) {}

  /**
   * Liveness probe.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'fund-unitisation',
      baseCcy: this.config.baseCcy,
    };
  }

  /** GET / - service info and the dealing endpoints */
  @Get()
  getRoot() {
    return {
      message: 'Fund NAV & Unitisation API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        nav: '/nav/calculate',
        unitisation: '/unitisation/process',
      },
    };
  }
}

import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { APP_CONFIG, AppConfig } from './config/app.config';

@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'wallet-tracker',
      quoteAsset: this.config.quoteAsset,
      storage: this.config.storageDriver,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Exchange Wallet Tracker API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        credentials: '/sessions/:sessionId/credentials',
        portfolio: '/sessions/:sessionId/portfolio',
        snapshots: '/sessions/:sessionId/portfolio/snapshots',
        history: '/sessions/:sessionId/portfolio/history',
        trend: '/sessions/:sessionId/portfolio/trend',
        reset: '/sessions/:sessionId/reset',
      },
    };
  }
}

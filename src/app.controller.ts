import { Controller, Get } from '@nestjs/common';
import { Public } from './auth/public.decorator';

/**
 * Health check para monitoreo.
 *
 * @example
 * GET /api/health
 * Response: { "status": "ok", "timestamp": "2026-03-15T10:00:00.000Z" }
 */
@Controller()
@Public()
export class AppController {
  @Get('health')
  getHealth() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}

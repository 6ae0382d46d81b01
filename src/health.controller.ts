import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DatabaseService } from './db/database.service';

const DB_CHECK_TIMEOUT_MS = 5000;

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(private readonly databaseService: DatabaseService) {}

  @Get()
  @ApiOperation({ summary: 'Health check' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('db')
  @ApiOperation({ summary: 'Database connectivity check (DbRouter read)' })
  async testDatabase() {
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error('Database query timeout')),
          DB_CHECK_TIMEOUT_MS,
        );
      });
      const result = await Promise.race([
        this.databaseService.db.executeRead((db) =>
          db
            .selectFrom('concept')
            .select((eb) => eb.fn.countAll().as('count'))
            .executeTakeFirst(),
        ),
        timeout,
      ]);

      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        database: {
          connected: true,
          conceptCount: Number(result?.count ?? 0),
        },
      };
    } catch (err) {
      const error = err instanceof Error ? err : new Error('Unknown error');
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
        database: {
          connected: false,
          error: error.message,
        },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

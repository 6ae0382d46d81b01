import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { EnrichmentService } from '../src/enrichment/enrichment.service';

// ts-node scripts/enrich-mappings.ts [--preserve | --no-preserve]
function parsePreserveFlag(args: string[]): boolean | undefined {
  if (args.includes('--preserve')) return true;
  if (args.includes('--no-preserve')) return false;
  return undefined;
}

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const summary = await app
      .get(EnrichmentService)
      .sync(parsePreserveFlag(process.argv.slice(2)));
    Logger.log(JSON.stringify(summary), 'enrich-mappings');
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  Logger.error('Enrichment failed', err, 'enrich-mappings');
  process.exit(1);
});

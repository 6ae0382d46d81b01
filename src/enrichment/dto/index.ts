export * from './enrichment.dto';

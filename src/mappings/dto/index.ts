export * from './mapping.dto';

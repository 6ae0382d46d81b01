export * from './domain.types';
export * from './mapping.repository';
export * from './setting.repository';
export * from './vocabulary.repository';
export * from './mapping-history.repository';

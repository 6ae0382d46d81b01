export * from './hierarchy-query.dto';
export * from './hierarchy-response.dto';

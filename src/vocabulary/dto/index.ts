export * from './vocabulary-response.dto';
export * from './concept-search.dto';

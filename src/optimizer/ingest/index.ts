export * from './types';
export * from './statementDedup';
export * from './githubSource';
export * from './scholarSource';
export * from './linkedinSource';
export * from './profileIngester';

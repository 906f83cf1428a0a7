export * from './githubRepository';

export * from './profileAnalyzer';

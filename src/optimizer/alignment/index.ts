export * from './alignmentEngine';

export * from './rewriteEngine';

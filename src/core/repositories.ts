/**
 * repositories.ts — punto di ingresso unico per le query di dominio.
 * I moduli in ./repositories/ sono divisi per tabella.
 */

export * from './repositories/audit';
export * from './repositories/catalog';
export * from './repositories/counters';
export * from './repositories/jobs';
export * from './repositories/leads';
export * from './repositories/leverage';
export * from './repositories/messages';
export * from './repositories/objections';
export * from './repositories/replies';
export * from './repositories/shared';
export * from './repositories/signals';
export * from './repositories/stats';
export * from './repositories/suppression';
export * from './repositories/system';

export * from './knowledge-base.po';
export * from './document.po';
export * from './chunk.po';
export * from './graph.po';

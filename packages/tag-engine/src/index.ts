export * from './types';
export * from './ndefCodec';
export * from './recordCodec';
export * from './TagSession';

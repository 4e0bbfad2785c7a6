export * from './base-image-provider';
export * from './blackforest-provider';
export * from './ideogram-provider';
export * from './luma-provider';
export * from './runway-provider';
export * from './stability-provider';
export * from './openai-provider';
export * from './provider-factory';

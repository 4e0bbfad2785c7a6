export * from './blackforest-translator';
export * from './ideogram-translator';
export * from './luma-translator';
export * from './runway-translator';
export * from './stability-translator';

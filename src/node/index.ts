export * from '../index.js';
export { ZipReader } from './zip/ZipReader.js';
export { FileArchiveSource, FileRandomAccess } from './zip/RandomAccess.js';
export { extractAll } from './zip/extract.js';

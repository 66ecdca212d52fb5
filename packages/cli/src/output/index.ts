export { printTable } from './table';
export { OutputRenderer } from './renderer';

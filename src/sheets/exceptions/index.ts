export { SheetReadException } from './sheet-read.exception';
export { SheetWriteException } from './sheet-write.exception';

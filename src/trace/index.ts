export {
  decomposeAddress,
  formatAddress,
  OFFSET_MASK,
  PAGE_SHIFT,
  parseTrace,
  parseTraceLine
} from './TraceParser';
export { readTraceFile } from './TraceReader';

export { CompositeTradeSink, type TradeEventSink } from './tradeEventSink.js';
export { CSV_HEADER, CsvTradeSink, buildTradesFilename, formatTradeRow, type CsvTradeSinkOptions } from './csvTradeSink.js';
export {
  ChartSnapshotWriter,
  buildChartSnapshot,
  type ChartMarker,
  type ChartSnapshot,
  type ChartSnapshotInput,
  type ChartSnapshotWriterOptions
} from './chartSnapshot.js';

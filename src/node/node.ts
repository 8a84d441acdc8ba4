export * from '../core/index';
export { ExporterBuilder, exporter, exporterFromEnv, type ExporterBuilderOptions } from './builder';
export { OtlpProtoTransport, createTransport } from './transport';

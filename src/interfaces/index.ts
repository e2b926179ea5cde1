export * from './records.interface';
export * from './window.interface';
export * from './anomaly.interface';
export * from './cleaning.interface';
export * from './pipeline.interface';

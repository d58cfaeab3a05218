export * from './entity';
export * from './lookup';
export * from './pagination';
export * from './nested-payload';
export * from './base.repository';
export * from './base.service';

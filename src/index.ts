export * from './codec/literal-scanner';
export * from './codec/coercion';
export * from './codec/conversions';
export * from './codec/composite-value';
export * from './codec/descriptor';
export * from './codec/encoding';
export * from './codec/errors';
export * from './codec/geometry';
export * from './codec/temporal';
export * from './codec/values';
export * from './codec/codec.service';
export * from './codec/codec.module';
export * from './common/type-map';
export { default as codecConfig, CodecConfig } from './config/codec.config';
export { default as typesConfig, type CompositeTypeDefinition } from './config/types.config';

export {CompactCodec} from './compact-codec.ts';
export {configFromEnv, parseConfig, type Config} from './config.ts';
export {estimateCardinality} from './estimator.ts';
export {
  ErrorKind,
  InvalidPrecisionError,
  MalformedInputError,
  PrecisionMismatchError,
  SketchError,
} from './errors.ts';
export {HyperLogLog} from './hyperloglog.ts';
export {MAX_PRECISION, MIN_PRECISION} from './precision.ts';
export {
  DEFAULT_SPARSE_MAX_REGISTERS,
  RedisCodec,
  type RedisCodecOptions,
} from './redis-codec.ts';
export {murmurHash64A} from './redis-hash.ts';
export {RedisHyperLogLog} from './redis-hyperloglog.ts';
export type {Registers} from './registers.ts';
export type {
  DecodedSketch,
  HashStrategy,
  RegisterUpdate,
  SketchCodec,
} from './variant.ts';

import {createLogContext} from '../../shared/src/logging.ts';
import {CompactCodec} from './compact-codec.ts';
import {configFromEnv} from './config.ts';
import {RedisCodec} from './redis-codec.ts';

type DefaultCodecs = {
  compact: CompactCodec;
  redis: RedisCodec;
};

let defaults: DefaultCodecs | undefined;

function getDefaults(): DefaultCodecs {
  if (defaults === undefined) {
    const config = configFromEnv(process.env);
    const lc = createLogContext(config.logLevel).withContext(
      'component',
      'hyperloglog',
    );
    defaults = {
      compact: new CompactCodec(lc),
      redis: new RedisCodec(lc, {
        sparseMaxRegisters: config.redisSparseMaxRegisters,
      }),
    };
  }
  return defaults;
}

/** Codec used by {@link HyperLogLog} when none is passed. */
export function defaultCompactCodec(): CompactCodec {
  return getDefaults().compact;
}

/** Codec used by {@link RedisHyperLogLog} when none is passed. */
export function defaultRedisCodec(): RedisCodec {
  return getDefaults().redis;
}

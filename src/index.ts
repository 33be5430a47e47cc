// Public surface of the swap router

export { SwapService, type SwapServiceDeps } from './service.js';
export { loadConfig, defaultConfig, validateConfig, type ServiceConfig, type RetryConfig, type CacheTtls } from './config.js';
export * from './types.js';
export {
    SwapError,
    DecodeError,
    NoRouteFoundError,
    InvalidRequestError,
    SimulationFailedError,
    TransactionTooLargeError,
    TransactionStageError,
    RpcError,
    ConfigError,
    ErrorCode,
    errorMessage,
} from './errors.js';

export { ConnectionChainSource, type ChainDataSource, type AccountData, type SimulationOutcome, type SignatureStatus } from './rpc/chainSource.js';
export { ConcurrencyLimiter, type LimiterTimeout } from './rpc/limiter.js';
export { KeypairSigner, loadKeypair, parseSecretKey, type Signer } from './rpc/signer.js';
export { classifyError, isTransientError, ErrorClass } from './rpc/classify.js';

export { quote, poolSpotPrice } from './sim/engine.js';
export { selectRoute, groupByVariant, compareQuotes } from './route/selector.js';
export { Deadline } from './route/deadline.js';
export {
    buildSwapTransaction,
    buildWrapTransaction,
    buildUnwrapTransaction,
    minimumAmountOut,
    type BuiltSwap,
    type BuildOptions,
} from './execute/builder.js';
export { SwapSubmitter } from './execute/submit.js';
export { createTtlCache, TtlCache } from './cache/ttlCache.js';
export { logger, setLogLevel, type LogLevel } from './utils/logger.js';

export { StatsError, ErrorCode, isStatsError, wrapError } from './StatsError';

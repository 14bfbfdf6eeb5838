/**
 * Monitoring Module
 *
 * Rolling-window health classification and host resource sampling.
 */

export { HealthAggregator, formatUptime, type HealthAggregatorConfig } from './health-aggregator.js';

export {
  HostResourceSampler,
  StaticResourceSampler,
  type ResourceSampler,
  type HostResourceSamplerOptions,
} from './resource-sampler.js';

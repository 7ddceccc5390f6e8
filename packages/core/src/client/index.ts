export { PipelineClient } from "./pipeline-client.js";
export type { PipelineClientOptions } from "./pipeline-client.js";
export { createPolicies, createSyncPolicies } from "./policies.js";
export type { AsyncPolicyFactoryOptions, PolicyFactoryOptions } from "./policies.js";

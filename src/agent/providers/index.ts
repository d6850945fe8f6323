export { BedrockConverseClient, type BedrockConverseClientConfig } from './bedrock-client.js';
export { ConverseProvider, type ConverseClient, type ConverseProviderConfig } from './converse-provider.js';
export * from './converse-format.js';
export * from './converse-stream.js';
export { createProvider, createAgent, type ProviderOptions, type AgentOptions } from './provider-factory.js';

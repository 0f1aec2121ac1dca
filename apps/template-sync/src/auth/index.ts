export { verifyCallerToken, type ServiceTokenOptions } from './service-token.js';
export { serviceTokenPlugin, type ServiceTokenPluginOptions } from './service-token-plugin.js';

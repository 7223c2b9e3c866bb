import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { ServerConfig } from '../../config.js';
import { CREDENTIAL_ENV_VAR } from '../config/ConfigResolver.js';
import type { PricingConnector } from './McpPricingGateway.js';

/**
 * Connector for the configured pricing server: a URL gets Streamable HTTP with
 * a bearer header, otherwise a child process over stdio with the credential
 * in its environment. With neither configured the bundled server is spawned.
 */
export function createPricingConnector(pricing: ServerConfig['pricing'], bundledServerPath: string): PricingConnector {
  const serverUrl = pricing.serverUrl;
  if (serverUrl) {
    return (apiKey) =>
      new StreamableHTTPClientTransport(new URL(serverUrl), {
        requestInit: { headers: { Authorization: `Bearer ${apiKey}` } },
      });
  }

  const command = pricing.serverCommand ?? process.execPath;
  const args = pricing.serverCommand ? pricing.serverArgs : [bundledServerPath];

  return (apiKey) =>
    new StdioClientTransport({
      command,
      args,
      env: { ...getDefaultEnvironment(), [CREDENTIAL_ENV_VAR]: apiKey },
      stderr: 'inherit',
    });
}

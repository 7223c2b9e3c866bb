#!/usr/bin/env node

/**
 * PCB Pricing MCP Server - Entry Point
 *
 * Reads the Nexar token from NEXAR_TOKEN. Without it every quote and
 * alternatives search is refused as unauthorized and the assistant falls back
 * to demo data.
 */

import * as dotenv from 'dotenv';
import { NexarApiClient } from './infrastructure/http/NexarApiClient.js';
import { CREDENTIAL_ENV_VAR } from './infrastructure/config/ConfigResolver.js';
import { PricingMcpServer } from './presentation/PricingMcpServer.js';
import { createDebugLog } from './utils/logging.js';

dotenv.config();

async function main() {
  const debugLog = createDebugLog(process.env.DEBUG === 'true', 'pricing-server');
  const token = process.env[CREDENTIAL_ENV_VAR]?.trim();
  const timeoutMs = Number(process.env.NEXAR_TIMEOUT_MS) || 3500;

  const server = new PricingMcpServer(
    { name: 'pcb-pricing-server', version: '1.0.0' },
    token ? new NexarApiClient(token, { timeoutMs }) : undefined,
    debugLog
  );

  if (!token) {
    console.error(`⚠️ ${CREDENTIAL_ENV_VAR} is not set - requests will be refused as unauthorized`);
  }

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await server.start();
  } catch (error) {
    console.error('💥 Fatal error in pricing server:', error);
    process.exit(1);
  }
}

void main();

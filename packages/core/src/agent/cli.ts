#!/usr/bin/env node
/**
 * ledger-agent CLI
 *
 * Usage:
 *   ledger-agent mine --who hacker --target 10   Mine empty marked blocks
 *   ledger-agent depth --nonce <nonce>           Confirmation depth of a tx
 *   ledger-agent head                            Show the current head
 *   ledger-agent config                          Show configuration
 */

import { Config } from './config.js';
import { Logger } from './logger.js';
import { HttpLedgerClient } from '../services/ledger.js';
import { MiningService } from '../services/mining.js';
import { ConfirmationAuditor } from '../services/audit.js';
import { parseArgs, formatDepthReport } from './args.js';

const VERSION = '0.1.0';

// ANSI color codes
const RESET = '\x1b[0m';
const WHITE = '\x1b[97m';
const CYAN = '\x1b[96m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';

const HELP = `
${WHITE}${BOLD}USAGE${RESET}
  ${CYAN}ledger-agent${RESET} <command> [options]

${WHITE}${BOLD}COMMANDS${RESET}
  ${CYAN}mine${RESET}            Mine empty blocks marked nice=<who> until the target count
  ${CYAN}depth${RESET}           Report whether a transaction is mined and how deep
  ${CYAN}head${RESET}            Show the ledger's current head
  ${CYAN}config${RESET}          Show current configuration
  ${CYAN}version${RESET}         Show version

${WHITE}${BOLD}OPTIONS${RESET}
  ${CYAN}--who${RESET} <id>      Identity to mark ${DIM}(mine, default: hacker)${RESET}
  ${CYAN}--target${RESET} <n>    Marked blocks wanted ${DIM}(mine, default: 10)${RESET}
  ${CYAN}--nonce${RESET} <n>     Transaction nonce ${DIM}(depth, required)${RESET}
  ${CYAN}--url${RESET} <url>     Ledger service ${DIM}(default: $LEDGER_URL or http://localhost)${RESET}
  ${CYAN}--difficulty${RESET} <bits>  Leading zero bits ${DIM}(default: 16)${RESET}
  ${CYAN}--interval${RESET} <n>  Nonces between head re-checks ${DIM}(default: 512)${RESET}
  ${CYAN}--timeout${RESET} <ms>  Per-request timeout ${DIM}(default: 5000)${RESET}
  ${CYAN}--config${RESET} <file> Config file ${DIM}(default: ~/.ledger-agent/config.json)${RESET}
  ${CYAN}--verbose${RESET}       Enable verbose logging
  ${CYAN}--help${RESET}          Show this help

${WHITE}${BOLD}EXAMPLES${RESET}
  ${DIM}$${RESET} ledger-agent mine --who hacker --target 10
  ${DIM}$${RESET} ledger-agent depth --nonce 7a4fd92a-0263-40dd-bc11-7e189ecf2c8f
`;

async function main() {
  const { command, options } = parseArgs(process.argv.slice(2));

  if (command === 'help' || command === '--help' || command === '-h' || command === undefined || options.help) {
    console.log(HELP);
    return;
  }
  if (command === 'version' || command === '--version' || command === '-v') {
    console.log(`${CYAN}ledger-agent${RESET} v${VERSION}`);
    return;
  }

  const config = new Config(options);
  const logger = new Logger({ verbose: config.verbose });
  const ledger = new HttpLedgerClient({ baseUrl: config.ledgerUrl, timeoutMs: config.timeoutMs });

  switch (command) {
    case 'mine':
      await mine(config, logger, ledger, options);
      break;

    case 'depth':
      await depth(logger, ledger, options);
      break;

    case 'head':
      await showHead(logger, ledger);
      break;

    case 'config':
      showConfig(config, logger);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(`Run "${CYAN}ledger-agent --help${RESET}" for usage.`);
      process.exitCode = 1;
  }
}

async function mine(config: Config, logger: Logger, ledger: HttpLedgerClient, options: Record<string, string | boolean>) {
  const who = typeof options.who === 'string' ? options.who : 'hacker';
  const target = typeof options.target === 'string' ? parseInt(options.target, 10) : 10;
  if (!Number.isInteger(target) || target < 0) {
    logger.error(`--target must be a non-negative integer`);
    process.exitCode = 1;
    return;
  }

  const miner = new MiningService(ledger, {
    difficulty: config.difficulty,
    recheckInterval: config.recheckInterval,
    taintedDelayMs: config.taintedDelayMs,
    rejectBackoffMs: config.rejectBackoffMs,
    retryDelayMs: config.retryDelayMs,
  }, logger);

  // Handle shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    miner.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(`${CYAN}Mining nice=${who}${RESET} against ${config.ledgerUrl} (difficulty ${config.difficulty} bits)`);
  const report = await miner.run(who, target);

  process.off('SIGINT', shutdown);
  process.off('SIGTERM', shutdown);

  logger.status('Marked', `${report.count}/${report.target}`, report.reached ? 'green' : 'yellow');
  logger.status('Accepted', report.accepted);
  logger.status('Rejected', report.rejected);
  logger.status('Stale', report.stale);
  logger.status('Tainted pools', report.tainted);
  if (!report.reached) process.exitCode = 130;
}

async function depth(logger: Logger, ledger: HttpLedgerClient, options: Record<string, string | boolean>) {
  if (typeof options.nonce !== 'string') {
    logger.error('--nonce <nonce> is required');
    process.exitCode = 1;
    return;
  }
  const auditor = new ConfirmationAuditor(ledger, logger);
  const report = await auditor.checkDepth(options.nonce);
  console.log(formatDepthReport(report));
}

async function showHead(logger: Logger, ledger: HttpLedgerClient) {
  const head = await ledger.getHead();
  logger.status('Index', head.block.index);
  logger.status('Hash', head.hash);
  logger.status('Transactions', head.block.txs.length);
  if (typeof head.block.nice === 'string') logger.status('Marker', head.block.nice);
}

function showConfig(config: Config, logger: Logger) {
  console.log(`\n${CYAN}ledger-agent Configuration${RESET}`);
  console.log(`${CYAN}${'─'.repeat(50)}${RESET}`);
  logger.status('Ledger', config.ledgerUrl);
  logger.status('Difficulty', `${config.difficulty} bits`);
  logger.status('Recheck', `every ${config.recheckInterval} nonces`);
  logger.status('Timeout', `${config.timeoutMs}ms`);
  logger.status('Config file', config.configPath);
}

main().catch((err: unknown) => {
  console.error(`${RED}Error:${RESET} ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});

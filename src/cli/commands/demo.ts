import { Command } from 'commander';
import type { AgentId, Observation } from '../../types/index.js';
import { buildDemoNetwork } from '../../demo/index.js';
import { logger, getLogLevel } from '../utils/logger.js';
import { loadConfig } from '../utils/config.js';

export const demoCommand = new Command('demo')
  .description('Run a short echo episode and print what the agent observes')
  .action(async () => {
    try {
      await runDemo();
    } catch (error) {
      if (error instanceof Error) {
        logger.error(`${error.name}: ${error.message}`);
        if (getLogLevel() === 'debug' && error.stack) {
          console.error(error.stack);
        }
      } else {
        logger.error(String(error));
      }
      process.exit(1);
    }
  });

async function runDemo(): Promise<void> {
  const config = loadConfig();
  const network = buildDemoNetwork({
    config,
    onProgress: (message) => logger.debug(message),
  });

  logger.section('Initial observations');
  printObservations(await network.reset());

  while (!network.isDone && network.currentStep < config.network.maxSteps) {
    const record = await network.step();
    logger.section(`Step ${record.step}`);
    printObservations(record.observations);
  }

  logger.blank();
  logger.success(`Episode finished after ${network.currentStep} steps`);
}

function printObservations(observations: Record<AgentId, Observation>): void {
  for (const [id, observation] of Object.entries(observations)) {
    logger.keyValue(id, observation.payload);
  }
}

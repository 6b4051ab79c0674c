#!/usr/bin/env node
// Prints the environment variables and locations.yaml entry for a new location
// and writes its POS mapping template into the data directory.
import 'dotenv/config';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import {
  mappingTemplateFileName,
  parseLocationArgs,
  renderEnvVars,
  renderLocationEntry,
  renderMappingTemplate,
} from '../src/services/location-config.js';
import { describeError } from '../src/utils/describe-error.js';
import { createLogger } from '../src/utils/logger.js';

const USAGE =
  'Usage: generate-pos-config <location_id> <location_name> <address> <city> <lat> <lon> <phone> <whatsapp> <subcategories>';

const logger = createLogger({ tag: 'pos-config' });

async function run(argv: string[]): Promise<number> {
  if (argv.length !== 9) {
    logger.error(`Invalid number of arguments. Expected 9 arguments, got ${argv.length}.`);
    console.log(USAGE);
    console.log(
      '\nExample:\n  generate-pos-config SAN_FERNANDO "San Fernando" "High Street, San Fernando" "San Fernando" 10.2833 -61.4667 18681234567 18681234567 "Restaurant"'
    );
    return 1;
  }

  const location = parseLocationArgs(argv);
  const { id, name } = location;
  logger.info(`Configuration generation started for: ${name}`);

  console.log('\n# Environment variables (add to your .env file)\n');
  console.log(renderEnvVars(location));
  console.log('# locations.yaml entry (add to data/locations.yaml)\n');
  console.log(renderLocationEntry(location));

  const dataDir = process.env.MENU_DATA_DIR || 'data';
  await fsp.mkdir(dataDir, { recursive: true });
  const mappingFile = path.join(dataDir, mappingTemplateFileName(id));
  await fsp.writeFile(mappingFile, renderMappingTemplate(id), 'utf8');
  logger.info(`Created POS mapping template: ${mappingFile}`);

  logger.info('Configuration generation completed!');
  logger.warn(`Remember to configure the POS systems for ${name} and fill in ${mappingFile}`);
  return 0;
}

try {
  process.exitCode = await run(process.argv.slice(2));
} catch (error) {
  logger.error(describeError(error));
  process.exitCode = 1;
}

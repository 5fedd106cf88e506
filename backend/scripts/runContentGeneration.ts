// Script to run the content generation stage on a strawman file without the API
// Run with: npm run generate --workspace backend -- scripts/fixtures/sample-strawman.json [output.json]

import dotenv from 'dotenv';
import path from 'path';
import * as fs from 'fs';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../.env') });

import { getSettings } from '../src/config/settings';
import { buildDependencies } from '../src/app';
import { publishDeck } from '../src/services/deckBuilderClient';
import { toStageResponse } from '../src/utils/responseFormatter';
import { StageInputError } from '../src/utils/errors';

async function runContentGeneration(inputPath: string, outputPath?: string) {
  const settings = getSettings();
  const { stage, textService, deckBuilder } = buildDependencies(settings);

  console.log(`📄 Loading strawman from ${inputPath}`);
  const strawman: unknown = JSON.parse(fs.readFileSync(inputPath, 'utf-8'));

  const healthy = await textService.healthCheck();
  console.log(healthy ? `✅ Text service reachable at ${settings.TEXT_SERVICE_URL}` : '⚠️  Text service health check failed, continuing anyway');

  const result = await stage.run(strawman);
  const publication = deckBuilder ? await publishDeck(deckBuilder, result.presentation) : {};
  const response = toStageResponse(result, publication);

  console.log(`\n${response.message}`);
  for (const failure of result.failedSlides) {
    console.log(`  ❌ Slide ${failure.slideNumber} (${failure.slideId}): ${failure.reason} - ${failure.message}`);
  }

  if (outputPath) {
    fs.writeFileSync(outputPath, JSON.stringify(response, null, 2));
    console.log(`💾 Result written to ${outputPath}`);
  }
}

const [inputPath, outputPath] = process.argv.slice(2);

if (!inputPath) {
  console.error('Usage: runContentGeneration.ts <strawman.json> [output.json]');
  process.exit(1);
}

runContentGeneration(path.resolve(inputPath), outputPath ? path.resolve(outputPath) : undefined)
  .then(() => process.exit(0))
  .catch((error) => {
    if (error instanceof StageInputError) {
      console.error(`❌ ${error.message}`);
      error.issues.forEach((issue) => console.error(`   - ${issue}`));
    } else {
      console.error('❌ Content generation failed:', error);
    }
    process.exit(1);
  });

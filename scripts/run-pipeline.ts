/**
 * Runs the full pipeline once from the command line
 *
 *   npm run pipeline -- --max-age-hours 12 --top 5 --iterations 2
 */

import { Config } from '../lib/config';
import { Orchestrator } from '../lib/orchestrator';
import { USAGE, parsePipelineArgs } from '../lib/cli';

async function main(): Promise<number> {
  const { overrides, errors, help } = parsePipelineArgs(process.argv.slice(2));

  if (help) {
    console.log(USAGE);
    return 0;
  }
  if (errors.length > 0) {
    errors.forEach(error => console.error(`❌ ${error}`));
    console.error(USAGE);
    return 1;
  }

  const settings = Config.getPipelineSettings(overrides);
  console.log('🚀 Running pipeline with settings:', settings);

  const result = await new Orchestrator(settings).run();

  if (!result.success) {
    console.error(`❌ Run ${result.run_id} failed at ${result.failed_stage}: ${result.error}`);
    return 1;
  }

  console.log(`✅ Run ${result.run_id} complete`);
  console.log(`   Script: ${result.script_path ?? '(not stored)'}`);
  console.log(`   Audio:  ${result.audio_path ?? '(skipped)'}`);
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('❌ Unexpected failure:', error);
    process.exitCode = 1;
  });

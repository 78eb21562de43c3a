import { config } from 'dotenv';
config({ path: '.env.local' });
config();

import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import {
  AnthropicGateway,
  loadPipelineConfig,
  OllamaGateway,
  runActionPlan,
  type ReportSource,
} from '@preop/shared';
import { parseCliArgs } from './args';
import { readStructuredReport } from './structured-input';

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    return 1;
  }
  const args = parsed.options;

  for (const path of [args.reportPath, args.structuredPath, args.guidelinesPath]) {
    if (path && !existsSync(path)) {
      console.error(`File not found: ${path}`);
      return 1;
    }
  }

  const settings = loadPipelineConfig();

  const remote = new AnthropicGateway({
    model: args.model ?? settings.remoteModel,
    apiKey: settings.anthropicApiKey,
  });
  const local = new OllamaGateway({
    ...settings.ollama,
    model: args.complianceModel ?? settings.ollama.model,
  });

  let report: ReportSource;
  if (args.structuredPath) {
    report = { kind: 'structured', report: await readStructuredReport(args.structuredPath) };
  } else if (args.reportPath) {
    report = { kind: 'pdf', path: args.reportPath };
  } else {
    console.error('No report given.');
    return 1;
  }

  console.log(`Models: ${remote.name} (actions), ${local.name} (compliance)`);
  const plan = await runActionPlan({
    report,
    guidelinePath: args.guidelinesPath,
    remote,
    local,
    headingOptions: settings.headings,
    targetLevel: args.level ?? settings.sectionTargetLevel,
    maxSectionChars: settings.maxSectionChars,
  });
  if (!plan) {
    console.error('Failed to build an action plan.');
    return 1;
  }

  const json = JSON.stringify(plan, null, args.pretty ? 2 : undefined);
  if (args.outputPath) {
    await writeFile(args.outputPath, `${json}\n`, 'utf-8');
    console.log(`Action plan written to ${args.outputPath}`);
  } else {
    process.stdout.write(`${json}\n`);
  }
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('preop-plan failed:', err);
    process.exitCode = 1;
  });

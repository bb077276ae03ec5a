/**
 * Refract Quick Start
 *
 * Minimal example: load configuration, build a runtime, summarize a note with
 * validation, then run a draft through the critique loop and print both traces.
 */

import { AgentManager, ConfigManager, Workflows, createRuntime, reflectiveImprove } from '@refract/core';

async function main() {
  // 1. Load configuration (refract.config.yaml, then environment)
  const config = await new ConfigManager().load();
  const context = createRuntime(config);
  const workflows = new Workflows(context, new AgentManager(context));

  console.log(`Using ${context.provider.name} (${context.provider.model}), traces in ${config.tracing.dir}`);
  console.log('');

  // 2. Summarize and validate
  const summary = await workflows.summarizeWithValidation(
    'Patient presents with intermittent chest pain on exertion, relieved by rest. '
      + 'ECG at rest is normal. Stress testing is recommended.',
    { taskId: 'example-summary' },
  );

  console.log('--- Summary ---');
  console.log(summary.summary);
  console.log('--- Validation ---');
  console.log(summary.validation);
  console.log('');

  // 3. Critique and revise a draft
  const reflection = await reflectiveImprove(context, {
    taskId: 'example-reflect',
    agentName: 'author',
    taskDescription: 'Explain stable angina to a first-year medical student in one paragraph.',
    draft: 'Stable angina is chest pain that happens when you exercise.',
    maxRevisions: 1,
  });

  console.log('--- Reviewed Draft ---');
  console.log(reflection.draft);
  console.log('');

  console.log('--- Traces ---');
  for (const exchange of [summary.exchange, reflection.exchange]) {
    console.log(`  ${exchange.taskId}: ${exchange.verdict}, ${exchange.messages.length} messages, `
      + `${exchange.costTokensPrompt}+${exchange.costTokensOutput} tokens, ${exchange.latencyMs}ms`);
  }
}

main().catch(console.error);

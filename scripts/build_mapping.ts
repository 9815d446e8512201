import { runBuildMapping } from './lib/cli/mapping_cli.js';
import { formatError } from './lib/errors.js';
import { toPosixRelative } from './lib/io.js';

async function main(): Promise<void> {
  const result = await runBuildMapping(process.argv.slice(2));

  if (result.check) {
    if (result.changed) {
      console.error(`Would update ${toPosixRelative(result.outFile)}`);
      process.exit(1);
    }
    console.log('build_mapping.ts check passed.');
    return;
  }

  const status = result.changed ? 'Updated' : 'No changes';
  console.log(
    `${status} ${toPosixRelative(result.outFile)} (${result.categories} categories, ${result.warnings} warning(s))`
  );
}

main().catch((error) => {
  console.error(formatError(error));
  process.exit(1);
});

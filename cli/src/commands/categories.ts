import chalk from 'chalk';
import { HttpSlipClient } from '../../../src/client/httpSlipClient';
import { PROMPT_CATALOG } from '../../../src/prompts/catalog';
import { errorMessage } from '../../../src/utils/errors';

interface CategoriesOptions {
  remote?: string;
}

interface CategoryRow {
  name: string;
  weight: number;
}

const loadCategories = async (options: CategoriesOptions): Promise<CategoryRow[]> => {
  if (options.remote) {
    return new HttpSlipClient(options.remote).categories();
  }
  return PROMPT_CATALOG.map((p) => ({ name: p.category, weight: p.weight }));
};

export const categories = async (options: CategoriesOptions): Promise<void> => {
  let rows: CategoryRow[];
  try {
    rows = await loadCategories(options);
  } catch (e) {
    console.error(chalk.red(`Error: ${errorMessage(e)}`));
    process.exit(1);
  }

  const total = rows.reduce((sum, row) => sum + row.weight, 0);

  console.log(chalk.bold(options.remote ? `Slip categories on ${options.remote}\n` : 'Slip categories\n'));

  for (const row of rows) {
    const share = ((row.weight / total) * 100).toFixed(1);
    console.log(`  ${chalk.cyan(row.name.padEnd(28))} ${chalk.dim(`weight ${row.weight} (${share}%)`)}`);
  }

  console.log(chalk.dim('\nUse: slipwraith print --category <name>'));
};

import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';

export async function confirmIngest(count: number, index: string, host: string): Promise<boolean> {
  console.log(chalk.cyan(`\n  About to load ${count} records into "${index}" on ${host}\n`));
  return confirm({
    message: 'Continue with bulk load?',
    default: false,
  });
}

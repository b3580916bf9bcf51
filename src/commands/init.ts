import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, DEFAULT_CONFIG_TEMPLATE } from '@/config/defaults';

export const initCommand = new Command('init')
  .description(`Initialize a default ${DEFAULT_CONFIG_FILE} configuration file`)
  .action(() => {
    const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);

    if (fs.existsSync(configPath)) {
      console.error(chalk.red(`Error: ${configPath} already exists.`));
      process.exit(1);
      return;
    }

    try {
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TEMPLATE, 'utf8');
      console.log(chalk.green(`Successfully created ${configPath}`));
    } catch (error) {
      console.error(chalk.red('Failed to create configuration file:'), error);
      process.exit(1);
    }
  });

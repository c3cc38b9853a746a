import { Command } from 'commander';
import inquirer from 'inquirer';
import { FileSecretStore, clearSecrets } from '../../credentials/store.js';
import { describeError } from '../../errors.js';
import { config } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';

type ConfigureAnswers = {
  username: string;
  password: string;
  token: string;
};

export const configureCommand = new Command('configure')
  .description('Store portal credentials and the notification token')
  .option('--clear', 'Remove stored credentials')
  .action(async (options: { clear?: boolean }) => {
    const store = new FileSecretStore(config.paths.secrets);

    try {
      if (options.clear) {
        await clearSecrets(store);
        console.log('Stored credentials removed.');
        return;
      }

      console.log('\n========================================');
      console.log('  LMS Deadline Watch: setup');
      console.log('========================================\n');
      console.log(`Secrets are saved to ${config.paths.secrets} (readable only by you).\n`);

      const answers = await inquirer.prompt<ConfigureAnswers>([
        {
          type: 'input',
          name: 'username',
          message: 'Portal username (student ID):',
          default: await store.get('USERNAME'),
          validate: (value: string) => value.trim().length > 0 || 'Username is required',
        },
        {
          type: 'password',
          name: 'password',
          message: 'Portal password:',
          mask: '*',
          validate: (value: string) => value.length > 0 || 'Password is required',
        },
        {
          type: 'password',
          name: 'token',
          message: 'Notification token (optional):',
          mask: '*',
        },
      ]);

      await store.set('USERNAME', answers.username.trim());
      await store.set('PASSWORD', answers.password);
      if (answers.token) {
        await store.set('NOTIFY_TOKEN', answers.token);
      }

      logger.info('Credentials stored');
      console.log('\nSaved.\n');
    } catch (error) {
      logger.error(`Configure failed: ${describeError(error)}`);
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
  });

import { Command } from 'commander';
import { colors, success, error, info } from '../utils/ui.js';
import { initConfig, CONFIG_DIR, CONFIG_FILENAME } from '../config.js';
import { errorMessage } from '../core/errors.js';

export function registerInitCommand(program: Command) {
    /**
     * Initialize Command
     * Writes a configuration file with the defaults
     */
    program
        .command('init')
        .description('Create a configuration file with the default ranges')
        .action(async () => {
            try {
                const config = await initConfig();

                success('Configuration created!');
                console.log();
                info(`Configuration saved to ${colors.cyan(`${CONFIG_DIR}/${CONFIG_FILENAME}`)}`);
                console.log();

                console.log(colors.bold('Configuration:'));
                console.log(`  Target Ranges: ${colors.cyan(config.targetRanges.join(', '))}`);
                console.log(`  Excluded Ranges: ${colors.cyan(config.excludeRanges.join(', ') || 'none')}`);
                console.log(`  Interval: ${colors.cyan(config.intervalSeconds.toString())}s`);
                console.log(`  Desktop Notifications: ${config.notifications.desktop.enabled ? colors.green('Enabled') : colors.dim('Disabled')}`);
                console.log();

                console.log(colors.bold('📥 Next steps:'));
                console.log(`   1. Adjust the ranges: ${colors.cyan('rangewatch config --set targetRanges=10.0.0.0/8')}`);
                console.log(`   2. Try an address: ${colors.cyan('rangewatch check 10.1.2.3')}`);
                console.log(`   3. Start watching: ${colors.cyan('sudo rangewatch watch')}`);
            } catch (err) {
                error(errorMessage(err));
            }
        });
}

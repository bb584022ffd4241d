import chalk from 'chalk';
import {
    getConfig,
    setConfig,
    isConfigKey,
    listConfigWithSources,
    getUserConfigPath,
    CONFIG_KEYS,
} from '../config.js';
import { FlagError } from '../errors.js';

interface ConfigOptions {
    show?: boolean;
}

export async function configCommand(
    key?: string,
    value?: string,
    options: ConfigOptions = {}
): Promise<void> {
    if (options.show || !key) {
        const config = listConfigWithSources();
        console.log('\nConfiguration:');
        console.log('─'.repeat(40));
        for (const [k, v] of Object.entries(config)) {
            console.log(`  ${k}: ${v.value || chalk.dim('(not set)')} ${chalk.dim(`[${v.source}]`)}`);
        }
        console.log(chalk.dim(`\nUser config: ${getUserConfigPath()}`));
        console.log('Available keys:', CONFIG_KEYS.join(', '));
        return;
    }

    if (!isConfigKey(key)) {
        throw new FlagError(`unknown config key "${key}" (available keys: ${CONFIG_KEYS.join(', ')})`);
    }

    if (value === undefined) {
        const val = getConfig(key);
        if (val) {
            console.log(val);
        } else {
            console.log(`Config key "${key}" is not set`);
        }
        return;
    }

    setConfig(key, value);
    console.log(chalk.green('✓'), `Set ${key} = ${value}`);
}

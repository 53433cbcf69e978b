#!/usr/bin/env tsx
// Usage: tsx scripts/evaluate.ts <personalCode> <amount> <periodMonths> [country]

import 'dotenv/config';
import chalk from 'chalk';
import { getDecisionConfig } from '../src/config/index.js';
import { createDecisionEngine } from '../src/decision/engine.js';
import { normalizeError } from '../src/decision/errors.js';
import { createLogger } from '../src/log.js';

const log = createLogger();

function usage(): never {
    console.error(chalk.yellow('usage: evaluate <personalCode> <amount> <periodMonths> [country]'));
    process.exit(2);
}

function main(): number {
    const [code, amountRaw, periodRaw, country = 'Estonia'] = process.argv.slice(2);
    if (!code || !amountRaw || !periodRaw) usage();
    const amount = Number(amountRaw);
    const period = Number(periodRaw);

    const engine = createDecisionEngine({ config: getDecisionConfig(), logger: log });
    const decision = engine.evaluate(code, amount, period, country);
    if (decision.ok) {
        console.log(`${chalk.green('✔ approved')} ${chalk.bold(decision.loanAmount)} € over ${chalk.bold(decision.loanPeriod)} months`);
        return 0;
    }
    console.log(`${chalk.red('✖ ' + decision.failure.code)} ${chalk.dim(decision.failure.message)}`);
    return 1;
}

try {
    process.exitCode = main();
} catch (err) {
    // config errors land here
    const info = normalizeError(err);
    log.error({ err: info }, 'evaluate failed');
    console.error(chalk.red(`${info.name}: ${info.message}`));
    process.exitCode = 2;
}

import type { CausalityEngine } from '../services/causality-engine.js';
import { DoctorService, formatDoctorReport } from './doctor.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: node dist/src/index.js [command] [options]

Commands:
  ask "<symptom>"            Explain a symptom from the last analysis window
  counterfactuals <nodeId>   List interventions for an event node (e.g. meal_12)
  update-graph               Run one meal → glucose edge learning pass
  doctor                     Run diagnostics on the store and configuration
  (none)                     Start the control plane API and scheduled jobs

Options:
  --help, -h                 Show this help message
  --json                     Output in machine-readable JSON format

Examples:
  node dist/src/index.js ask "Why am I tired?"
  node dist/src/index.js ask "Why am I tired?" --json
  node dist/src/index.js counterfactuals meal_12
  node dist/src/index.js update-graph
  node dist/src/index.js doctor --json
`.trim();

/** What a one-shot command needs. Opened lazily so `--help` never touches the database. */
export interface CliContext {
    engine: CausalityEngine;
    probeStore: () => void;
}

export type CliContextFactory = () => CliContext;

function positional(argv: string[]): string[] {
    return argv.slice(1).filter((arg) => !arg.startsWith('--'));
}

function reportFailure(command: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[CausalEngine] ${command} failed: ${message}`);
    process.exitCode = 1;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/** `ask "<symptom>"`: prints ranked explanations. */
export async function handleAskCli(argv: string[], open: CliContextFactory): Promise<boolean> {
    if (argv[0] !== 'ask') return false;

    const symptom = positional(argv).join(' ').trim();
    if (!symptom) {
        console.error('Usage: ask "<symptom>"');
        process.exitCode = 1;
        return true;
    }

    try {
        const explanations = await open().engine.querySymptom(symptom);
        if (argv.includes('--json')) {
            console.log(JSON.stringify(explanations, null, 2));
        } else if (explanations.length === 0) {
            console.log(`No explanation for '${symptom}' in the current window.`);
        } else {
            explanations.forEach((explanation, index) => {
                console.log(`${index + 1}. [${Math.round(explanation.strength * 100)}%] ${explanation.causalChain.join(' → ')}`);
                console.log(`   ${explanation.narrative}`);
            });
        }
        process.exitCode = 0;
    } catch (error) {
        reportFailure('ask', error);
    }
    return true;
}

/** `counterfactuals <nodeId>`: prints templated interventions. */
export function handleCounterfactualsCli(argv: string[], open: CliContextFactory): boolean {
    if (argv[0] !== 'counterfactuals') return false;

    const [eventNodeId] = positional(argv);
    if (!eventNodeId) {
        console.error('Usage: counterfactuals <nodeId>');
        process.exitCode = 1;
        return true;
    }

    try {
        const counterfactuals = open().engine.generateCounterfactual(eventNodeId);
        if (argv.includes('--json')) {
            console.log(JSON.stringify(counterfactuals, null, 2));
        } else {
            for (const counterfactual of counterfactuals) {
                console.log(
                    `- ${counterfactual.description} (impact ${counterfactual.impact.toFixed(2)}, ${counterfactual.effort})`,
                );
            }
        }
        process.exitCode = 0;
    } catch (error) {
        reportFailure('counterfactuals', error);
    }
    return true;
}

/** `update-graph`: one edge learning pass over the configured look-back. */
export function handleUpdateGraphCli(argv: string[], open: CliContextFactory): boolean {
    if (argv[0] !== 'update-graph') return false;

    try {
        const summary = open().engine.updateGraph();
        console.log(argv.includes('--json')
            ? JSON.stringify(summary, null, 2)
            : `Scanned ${summary.mealsScanned} meal(s): ${summary.edgesUpdated} edge(s) updated, ${summary.edgesCreated} created.`);
        process.exitCode = 0;
    } catch (error) {
        reportFailure('update-graph', error);
    }
    return true;
}

/**
 * Handle the `doctor` command.
 * Exit code 2 when not ready, 1 when degraded, 0 otherwise.
 */
export function handleDoctorCli(argv: string[], open: CliContextFactory): boolean {
    if (argv[0] !== 'doctor') return false;

    try {
        const context = open();
        const report = new DoctorService({
            probeStore: context.probeStore,
            maturityPhase: () => context.engine.maturityPhase(),
        }).runAll();
        console.log(formatDoctorReport(report, argv.includes('--json')));

        if (report.readiness.level === 'not_ready') {
            process.exitCode = 2;
        } else if (report.readiness.level === 'degraded') {
            process.exitCode = 1;
        } else {
            process.exitCode = 0;
        }
    } catch (error) {
        reportFailure('doctor', error);
    }
    return true;
}

const KNOWN_COMMANDS = new Set(['ask', 'counterfactuals', 'update-graph', 'doctor']);

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0] ?? '';
    if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
        return false;
    }

    console.error(`[CausalEngine] Unknown command: '${command}'`);
    console.error(`Run 'node dist/src/index.js --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/**
 * Dispatch a one-shot command. Returns `true` when one ran, `false` when the
 * process should start the long-running server instead.
 */
export async function runCli(argv: string[], open: CliContextFactory): Promise<boolean> {
    if (handleHelpCli(argv)) return true;
    if (handleUnknownCommand(argv)) return true;
    if (await handleAskCli(argv, open)) return true;
    if (handleCounterfactualsCli(argv, open)) return true;
    if (handleUpdateGraphCli(argv, open)) return true;
    return handleDoctorCli(argv, open);
}

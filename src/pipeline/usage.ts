import type { PhaseUsage, TokenUsage, UsagePhase, UsageReport } from './types';

const PHASES: readonly UsagePhase[] = ['chunkTranscription', 'gapAnalysis', 'timingOptimization'];

function emptyPhase(): PhaseUsage {
    return { promptTokens: 0, completionTokens: 0, calls: 0 };
}

/**
 * Token accounting for one job, per phase. Calls that fail before a reply arrives
 * are not counted.
 */
export class UsageTracker {
    private readonly phases: Record<UsagePhase, PhaseUsage> = {
        chunkTranscription: emptyPhase(),
        gapAnalysis: emptyPhase(),
        timingOptimization: emptyPhase(),
    };

    record(phase: UsagePhase, usage: TokenUsage): void {
        const p = this.phases[phase];
        p.promptTokens += usage.promptTokens;
        p.completionTokens += usage.completionTokens;
        p.calls += 1;
    }

    report(): UsageReport {
        const total = emptyPhase();
        const phases: Record<UsagePhase, PhaseUsage> = {
            chunkTranscription: { ...this.phases.chunkTranscription },
            gapAnalysis: { ...this.phases.gapAnalysis },
            timingOptimization: { ...this.phases.timingOptimization },
        };
        for (const phase of PHASES) {
            const p = phases[phase];
            total.promptTokens += p.promptTokens;
            total.completionTokens += p.completionTokens;
            total.calls += p.calls;
        }
        return { phases, total };
    }
}

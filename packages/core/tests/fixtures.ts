import type { StalenessDecision, StalenessVerdict, StepConfig } from '@closeflow/shared';

export function stepConfig(key: string, overrides: Partial<StepConfig> = {}): StepConfig {
    return {
        key,
        run: { command: 'true', args: [], env: {} },
        inputs: [`in/${key}.txt`],
        outputs: [`out/${key}.txt`],
        manual: false,
        optional: false,
        after: [],
        ...overrides,
    };
}

/**
 * Monthly close topology: two creation branches converging on the entries
 * update, then inventory, a manual review and the report.
 */
export function closingSteps(): StepConfig[] {
    return [
        stepConfig('step1_nfi'),
        stepConfig('step1_nf', { optional: true }),
        stepConfig('step2_nf_agg', { after: ['step1_nf'] }),
        stepConfig('step2_nfi_agg', { after: ['step1_nfi'] }),
        stepConfig('step3_update_entradas', { after: ['step2_nf_agg', 'step2_nfi_agg'] }),
        stepConfig('step4_inventory', { after: ['step3_update_entradas'] }),
        stepConfig('step4b_review_inventory', {
            after: ['step4_inventory'],
            manual: true,
            run: undefined,
            instructions: 'Open the inventory workbook, refresh, save and close it.',
        }),
        stepConfig('step5_report', { after: ['step4b_review_inventory'] }),
    ];
}

export function verdict(key: string, decision: StalenessDecision): StalenessVerdict {
    return { key, decision, reason: 'test' };
}

/**
 * Returns whatever `fn` throws, or undefined.
 */
export function thrownBy(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}

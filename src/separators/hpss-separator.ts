import type { AddLog, HpssConfig, StemSeparator, StemSet } from '../types';
import { designBandstop, filterSections } from '../utils/eq-filter';
import { errorMessage } from '../utils/errors';
import { separate, resolveConfig, validateConfig } from '../utils/hpss';
import { elapsedSeconds, silentLog } from '../utils/logger';

export interface NotchSettings {
    lowHz: number;
    highHz: number;
    order?: number;
}

export interface HpssSeparatorOptions {
    config?: Partial<HpssConfig>;
    /** Band-stop applied to the harmonic stem, written as `harmonic_eq` */
    notch?: NotchSettings;
    addLog?: AddLog;
}

/**
 * Median-filter separation behind the StemSeparator interface.
 * Stems: `harmonic`, `percussive` and, with a notch, `harmonic_eq`.
 */
export class HpssSeparator implements StemSeparator {
    readonly kind = 'algorithmic';
    readonly label: string;
    readonly config: HpssConfig;
    private readonly notch: NotchSettings | undefined;
    private readonly addLog: AddLog;

    constructor(options: HpssSeparatorOptions = {}) {
        this.config = resolveConfig(options.config);
        validateConfig(this.config);
        this.notch = options.notch;
        this.addLog = options.addLog ?? silentLog;
        this.label = this.notch ? 'HPSS + EQ' : 'HPSS';
    }

    async separate(waveform: ArrayLike<number>, sampleRate: number): Promise<StemSet> {
        const startTime = performance.now();
        this.addLog(`Starting ${this.label} separation...`, 'info');

        try {
            // Notch edges are checked before any separation work
            const sections = this.notch
                ? designBandstop(this.notch.lowHz, this.notch.highHz, sampleRate, this.notch.order)
                : null;

            const { harmonic, percussive } = separate(waveform, sampleRate, this.config);
            const stems: Record<string, Float32Array> = { harmonic, percussive };

            if (sections && this.notch) {
                this.addLog(`Applying band-stop ${this.notch.lowHz}-${this.notch.highHz} Hz to harmonic stem`, 'info');
                stems['harmonic_eq'] = filterSections(sections, harmonic);
            }

            this.addLog(`Finished separation in ${elapsedSeconds(startTime)}s.`, 'success');
            return { stems, sampleRate };
        } catch (error) {
            this.addLog(`Separation failed: ${errorMessage(error)}`, 'error');
            throw error;
        }
    }
}

/**
 * Request deadline
 *
 * Started once per quote request, before discovery. Every slow step races
 * against the same timer, so the whole request is bounded by one budget.
 */

export const DEADLINE = Symbol('deadline');

export type Raced<T> = Awaited<T> | typeof DEADLINE;

export class Deadline {
    readonly expired: Promise<typeof DEADLINE>;
    private timer: NodeJS.Timeout | undefined;

    constructor(readonly ms: number) {
        this.expired = new Promise<typeof DEADLINE>(resolve => {
            this.timer = setTimeout(() => resolve(DEADLINE), ms);
        });
    }

    /** `work` keeps running after the deadline; its rejection is still observed */
    race<T>(work: Promise<T>): Promise<Raced<T>> {
        return Promise.race([work, this.expired]);
    }

    clear(): void {
        clearTimeout(this.timer);
    }
}

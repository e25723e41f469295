//
//
//

// ---------------------------------------------------------------------------
// Instant
// ---------------------------------------------------------------------------

export class Instant {
    private constructor(private readonly _value: number) {}

    public static now(): Instant {
        return new Instant(Date.now());
    }

    public subtract(other: Instant): Duration {
        return Duration.fromMilliseconds(this._value - other._value);
    }
}

// ---------------------------------------------------------------------------
// Duration
// ---------------------------------------------------------------------------

export class Duration {
    private constructor(private readonly _value: number) {}

    public static fromMilliseconds(milliseconds: number): Duration {
        return new Duration(milliseconds);
    }

    public static zero(): Duration {
        return new Duration(0);
    }

    public get milliseconds(): number {
        return this._value;
    }

    public toString(): string {
        return `${this._value}ms`;
    }
}

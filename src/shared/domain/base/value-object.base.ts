export abstract class ValueObject<T extends object> {
    protected readonly props: T;

    protected constructor(props: T) {
        this.props = Object.freeze({ ...props });
    }

    equals(other?: ValueObject<T>): boolean {
        if (other === null || other === undefined) return false;
        if (other.constructor !== this.constructor) return false;
        return this.equalsCore(other);
    }

    protected abstract equalsCore(other: ValueObject<T>): boolean;
}

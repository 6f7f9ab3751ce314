type ServiceToken = symbol;
type Factory<T> = () => T;

/**
 * Token-based DI container with lazy singleton resolution.
 * Holds the providers of one masking run (random source, file repository,
 * masker, use case). Registering a token again replaces its provider and
 * drops any instance already created, so callers can swap the random source
 * or file repository before the use case is built.
 */
export class Container {
    private readonly factories = new Map<ServiceToken, Factory<unknown>>();
    private readonly instances = new Map<ServiceToken, unknown>();

    register<T>(token: ServiceToken, factory: Factory<T>): this {
        this.factories.set(token, factory);
        this.instances.delete(token);
        return this;
    }

    resolve<T>(token: ServiceToken): T {
        if (this.instances.has(token)) {
            return this.instances.get(token) as T;
        }
        const factory = this.factories.get(token);
        if (!factory) {
            throw new Error(`No provider registered for token: ${String(token)}`);
        }
        const created = factory() as T;
        this.instances.set(token, created);
        return created;
    }
}

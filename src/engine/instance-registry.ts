export type InstanceState = 'Created' | 'Running' | 'Completed' | 'TimedOut' | 'Crashed' | 'Destroyed'

/**
 * A container started for one spec execution attempt.
 */
export type ContainerInstance = {
  /** Container name, unique per process */
  readonly id: string;
  readonly image: string;
  readonly specId: string;
  readonly workdir: string;
  readonly createdAt: Date;
  state: InstanceState;
}

/**
 * Process-wide set of instances that have not been destroyed yet.
 * Owned by the orchestrator run and shared with the environment manager.
 */
export class InstanceRegistry {
  private readonly instances = new Map<string, ContainerInstance>()

  register(instance: ContainerInstance): void {
    this.instances.set(instance.id, instance)
  }

  unregister(id: string): void {
    this.instances.delete(id)
  }

  has(id: string): boolean {
    return this.instances.has(id)
  }

  live(): ContainerInstance[] {
    return [...this.instances.values()]
  }
}

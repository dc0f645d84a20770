import { ValidationError } from "../errors.js";
import type { WorkerBackend } from "./types.js";

/** Worker backends by deployment name. */
export class BackendRegistry {
  private backends = new Map<string, WorkerBackend>();

  add(backend: WorkerBackend): void {
    if (this.backends.has(backend.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Backend "${backend.name}" already registered`);
    }
    this.backends.set(backend.name, backend);
  }

  /** Register or replace. */
  set(backend: WorkerBackend): void {
    this.backends.set(backend.name, backend);
  }

  remove(name: string): boolean {
    return this.backends.delete(name);
  }

  get(name: string): WorkerBackend | undefined {
    return this.backends.get(name);
  }

  require(name: string): WorkerBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new ValidationError(
        "UNKNOWN_DEPLOYMENT",
        `No worker backend named "${name}" (registered: ${this.names().join(", ") || "none"})`,
      );
    }
    return backend;
  }

  list(): WorkerBackend[] {
    return [...this.backends.values()];
  }

  names(): string[] {
    return [...this.backends.keys()];
  }
}

export class Config {
  private data: Record<string, unknown> = {};
  private frozen = false;

  loadEnv(keys: readonly string[], env: NodeJS.ProcessEnv = process.env) {
    this.assertNotFrozen();
    for (const k of keys) {
      const value = env[k];
      // blank values in .env files mean "unset"
      if (value !== undefined && value.trim() !== "") this.data[k] = value;
    }
    return this;
  }

  merge(obj: Record<string, unknown>) {
    this.assertNotFrozen();
    Object.assign(this.data, obj);
    return this;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  has(key: string): boolean {
    return this.data[key] !== undefined;
  }

  all(): Record<string, unknown> {
    return { ...this.data };
  }

  freeze() {
    this.frozen = true;
    return this;
  }

  private assertNotFrozen() {
    if (this.frozen) throw new Error("Config is frozen");
  }
}

/**
 * Singleton: one shared settings object for the whole program.
 */

export class AppSettings {
  private static instance: AppSettings | undefined;
  private readonly values = new Map<string, string>();

  private constructor() {}

  static getInstance(): AppSettings {
    if (!AppSettings.instance) {
      AppSettings.instance = new AppSettings();
    }
    return AppSettings.instance;
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }
}

export function demo(print: (line: string) => void): void {
  const first = AppSettings.getInstance();
  const second = AppSettings.getInstance();

  first.set("theme", "dark");

  print(`Same instance: ${first === second}`);
  print(`Theme: ${second.get("theme") ?? "unset"}`);
}

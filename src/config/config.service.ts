type EnvMap = { [key: string]: string | undefined };

export class ConfigService {
  private static instance: ConfigService;
  private config: EnvMap;

  constructor(env: EnvMap = process.env) {
    this.config = env;
  }

  public static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  public get(key: string, defaultValue: string = ""): string {
    const value = this.config[key];
    return value ?? defaultValue;
  }

  /** Unset or blank keys fall back to the default; anything else is parsed as-is. */
  public getNumber(key: string, defaultValue: number): number {
    const value = this.config[key]?.trim();
    return value ? Number(value) : defaultValue;
  }

  public getList(key: string, defaultValue: string[] = []): string[] {
    const value = this.config[key]?.trim();
    if (!value) return defaultValue;
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
}

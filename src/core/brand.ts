export const BRAND = {
  name: "Leakscope",
  cli: {
    primary: "leakscope",
  },
  storage: {
    configDirName: ".leakscope",
    configFileName: "config.json",
  },
  env: {
    configPath: "LEAKSCOPE_CONFIG_PATH",
  },
} as const;

export function commandScope(command: string): string {
  return `${BRAND.cli.primary} ${command}`;
}

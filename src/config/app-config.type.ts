export type AppConfig = {
  nodeEnv: string;
  name: string;
  version: string;
  workingDirectory: string;
  port: number;
  apiPrefix: string;
};

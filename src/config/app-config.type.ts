export type AppConfig = {
  nodeEnv: string;
  name: string;
};

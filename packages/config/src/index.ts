export { loadBaseEnv, loadLoaderEnv, resolveRepoRoot } from "./env.js";
export type {
  BaseEnv,
  DeployEnv,
  LoaderConfig,
  LoaderEnv,
  LogLevel,
  NodeEnv,
  UnknownAssetsPolicy,
} from "./env.js";

/** Layered profilectl settings. */
export type ResolverConfig = {
  max_depth: number;
  user_dir: string;
};

export type ServerConfig = {
  port: number;
};

export type ProfilectlConfig = {
  schema_version: string;
  spec_version: string;
  namespace: string;
  configs_dir: string;
  slicers_dir: string;
  profile_extensions: string[];
  ignore: string[];
  resolver: ResolverConfig;
  server: ServerConfig;
};

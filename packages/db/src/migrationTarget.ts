// Production migrations run on their own connection string, never the service's.
export const resolveMigrationUrl = (env: NodeJS.ProcessEnv) => {
  const url = env.MIGRATIONS_DATABASE_URL || env.DATABASE_URL;
  if (!url) {
    throw new Error("missing_required_envs:MIGRATIONS_DATABASE_URL|DATABASE_URL");
  }
  if (env.NODE_ENV === "production" && !env.MIGRATIONS_DATABASE_URL) {
    throw new Error("migrations_database_url_required_in_production");
  }
  return url;
};

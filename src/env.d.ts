declare global {
  namespace NodeJS {
    interface ProcessEnv {
      GITHUB_TOKEN?: string;
      NATIVES_INSTALL_DIR?: string;
    }
  }
}

export {};

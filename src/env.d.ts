declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    PORT?: string;
    DATABASE_PATH?: string;        // e.g. data/todos.db, or :memory:
    STORE_DRIVER?: string;         // sqlite | memory
    LOG_FORMAT?: string;           // morgan format name, or "off"
    ENABLE_ADMIN_RESET?: string;   // true | false
  }
}

// Small in-memory sheet pool and every equipment kind on, whatever the local .env says.
process.env.SHEET_POOL_SIZE = "5";
process.env.DISABLED_FEATURES = "";

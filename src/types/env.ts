/** Raw configuration as read from the process environment. Everything is a string until resolved. */
export interface Env {
  // Pump profile
  HEATPUMP_BRAND?: string;
  CATALOG_DIR?: string;

  // Transport
  GATEWAY_ID?: string;
  MQTT_URL?: string;
  MQTT_USERNAME?: string;
  MQTT_PASSWORD?: string;
  MQTT_CLIENT_ID?: string;

  // Storage
  DB_PATH?: string;
  STORAGE_TIMEOUT_MS?: string;

  // HTTP
  HTTP_PORT?: string;
  API_JWT_SECRET?: string;

  // Analytics
  ELECTRICITY_PRICE?: string;
  UPDATE_INTERVAL_SECONDS?: string;
  LATEST_LOOKBACK_HOURS?: string;
  ALARM_LOOKBACK_HOURS?: string;
  HOT_WATER_MIN_CYCLE_SECONDS?: string;
  TEMP_WRAP_THRESHOLD?: string;
  COP_CARNOT_EFFICIENCY?: string;

  LOG_LEVEL?: string;
}

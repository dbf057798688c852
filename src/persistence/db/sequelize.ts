/**
 * Sequelize Database Connection
 *
 * Connects to the MySQL database that holds agencies, offenders,
 * enforcement records, match reviews and session state.
 */
import { Sequelize } from "sequelize";
import config from "../../config";
import { logger } from "../../monitoring/logger";

const USER = encodeURIComponent(config.dbUser);
const PASSWORD = encodeURIComponent(config.dbPassword);
const URI = `mysql://${USER}:${PASSWORD}@${config.dbHost}:${config.dbPort}/${config.dbName}`;

const sequelize = new Sequelize(URI, {
  dialect: "mysql",
  // Only log queries in development; production uses structured Pino logs
  logging:
    config.env === "development"
      ? (msg) => logger.debug({ sql: msg }, "SQL Query")
      : false,
  pool: {
    max: 10, // Max connections in pool
    min: 2, // Min connections kept alive
    acquire: 30000, // Max ms to wait for connection
    idle: 10000, // Max ms a connection can be idle
  },
  // Stored dates are UK calendar dates; keep DATETIME columns in UTC
  timezone: "+00:00",
});

export default sequelize;

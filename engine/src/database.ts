/**
 * WinProv Engine — Database Existence Check
 *
 * Asks a SQL Server instance whether a database exists. An unreachable
 * server is reported as such and never as "absent".
 */

import { ConnectionPool, type config as MssqlConfig } from "mssql";
import { errorMessage } from "./errors";
import type {
  DatabaseCatalog,
  DatabaseCredentials,
  DbExistsResult,
} from "./types";
import { createLogger, type Logger } from "./utils/logger";

/**
 * Split "host\INSTANCE" and "host,port" forms into tedious settings.
 */
export function parseServerAddress(serverAddress: string): {
  server: string;
  instanceName?: string;
  port?: number;
} {
  const [hostPart, portPart] = serverAddress.split(",", 2);
  const [server, instanceName] = hostPart.trim().split("\\", 2);
  const port = portPart !== undefined ? Number(portPart.trim()) : undefined;
  return {
    server,
    instanceName: instanceName || undefined,
    port: port !== undefined && Number.isInteger(port) ? port : undefined,
  };
}

export function buildConnectionConfig(
  serverAddress: string,
  credentials: DatabaseCredentials,
): MssqlConfig {
  const { server, instanceName, port } = parseServerAddress(serverAddress);
  return {
    server,
    port: credentials.port ?? port,
    user: credentials.user,
    password: credentials.password,
    database: "master",
    connectionTimeout: 15000,
    options: {
      instanceName,
      encrypt: true,
      trustServerCertificate: credentials.trustServerCertificate ?? false,
    },
  };
}

export const mssqlCatalog: DatabaseCatalog = {
  async listDatabases(serverAddress, credentials) {
    const pool = new ConnectionPool(
      buildConnectionConfig(serverAddress, credentials),
    );
    await pool.connect();
    try {
      const result = await pool
        .request()
        .query<{ name: string }>("SELECT name FROM sys.databases");
      return result.recordset.map((row) => row.name);
    } finally {
      await pool.close();
    }
  },
};

export interface DbExistsOptions extends DatabaseCredentials {
  catalog?: DatabaseCatalog;
  logger?: Logger;
}

export async function dbExists(
  serverAddress: string,
  dbName: string,
  opts: DbExistsOptions = {},
): Promise<DbExistsResult> {
  const catalog = opts.catalog ?? mssqlCatalog;
  const logger = opts.logger ?? createLogger();

  let names: string[];
  try {
    names = await catalog.listDatabases(serverAddress, {
      user: opts.user,
      password: opts.password,
      port: opts.port,
      trustServerCertificate: opts.trustServerCertificate,
    });
  } catch (err: unknown) {
    const error = errorMessage(err);
    logger.warn({ server: serverAddress, error }, "Database server unreachable");
    return { status: "unreachable", error };
  }

  // SQL Server's default collation compares names case-insensitively
  const wanted = dbName.toLowerCase();
  const found = names.some((name) => name.toLowerCase() === wanted);
  logger.debug(
    { server: serverAddress, database: dbName, found, count: names.length },
    "Enumerated databases",
  );
  return found ? { status: "found" } : { status: "absent" };
}

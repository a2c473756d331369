import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClickHouseClient, createClient } from '@clickhouse/client';
import { SCHEMAS } from './schemas';

export type QueryParams = Record<string, unknown>;

@Injectable()
export class ClickHouseService implements OnModuleInit, OnModuleDestroy {
  private readonly client: ClickHouseClient;
  private readonly database: string;

  constructor(configService: ConfigService) {
    this.database = configService.get<string>(
      'CLICKHOUSE_DATABASE',
      'workspace_service',
    );
    this.client = createClient({
      url: configService.get<string>('CLICKHOUSE_HOST', 'http://localhost:8123'),
      username: configService.get<string>('CLICKHOUSE_USER', 'default'),
      password: configService.get<string>('CLICKHOUSE_PASSWORD', ''),
      database: this.database,
    });
  }

  async onModuleInit() {
    await this.initDatabase();
  }

  async onModuleDestroy() {
    await this.client.close();
  }

  private async initDatabase() {
    await this.client.command({
      query: `CREATE DATABASE IF NOT EXISTS ${this.database}`,
    });

    for (const schema of Object.values(SCHEMAS)) {
      const query = schema.replace(/{database}/g, this.database);
      await this.client.command({ query });
    }
  }

  async query<T>(sql: string, params?: QueryParams): Promise<T[]> {
    const result = await this.client.query({
      query: sql,
      query_params: params,
      format: 'JSONEachRow',
    });
    return result.json() as Promise<T[]>;
  }

  /**
   * Runs a `SELECT count() AS count ...` query and returns the number.
   * UInt64 values arrive as strings in JSON output.
   */
  async count(sql: string, params?: QueryParams): Promise<number> {
    const rows = await this.query<{ count: string | number }>(sql, params);
    return rows.length > 0 ? Number(rows[0].count) : 0;
  }

  async insert<T>(table: string, values: T[]): Promise<void> {
    await this.client.insert({
      table,
      values,
      format: 'JSONEachRow',
    });
  }

  async command(sql: string, params?: QueryParams): Promise<void> {
    await this.client.command({ query: sql, query_params: params });
  }
}

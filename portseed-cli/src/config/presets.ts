import type { Preset } from "./types.js";

export const BUILTIN_PRESETS: Record<string, Preset> = {
  db: {
    ignorePrefixes: [
      "DB",
      "DATABASE",
      "POSTGRES",
      "MYSQL",
      "MONGO",
      "REDIS",
      "MEMCACHED",
      "ES",
      "CLICKHOUSE",
      "INFLUX",
    ],
    includeKeys: [],
    excludeKeys: [],
  },
  queues: {
    ignorePrefixes: [],
    includeKeys: [],
    excludeKeys: [
      "RABBITMQ_PORT",
      "AMQP_PORT",
      "NATS_PORT",
      "KAFKA_PORT",
      "PULSAR_PORT",
      "ACTIVEMQ_PORT",
      "ARTEMIS_PORT",
      "SQS_PORT",
      "NSQ_PORT",
      "RSMQ_PORT",
      "BEANSTALKD_PORT",
    ],
  },
};

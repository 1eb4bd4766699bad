import { connect, MqttClient as RawClient } from "mqtt";
import { Env } from "../utils/env";
import { Logger } from "../utils/logger";
import { GestureExecutor } from "../motion/executor";
import { handleCommandPayload } from "../commands/handler";

/**
 * Remote command intake over MQTT: commands arrive on the command topic,
 * acks go back on the ack topic and a state document follows every command.
 */
export class MqttBridge {
  private client: RawClient;
  private env: Env;
  private logger: Logger;
  private executor: GestureExecutor;

  constructor(env: Env, logger: Logger, executor: GestureExecutor) {
    this.env = env;
    this.logger = logger;
    this.executor = executor;
    this.logger.info("MQTT connecting", {
      url: env.MQTT_URL,
      cmdTopic: env.ROBOT_CMD_TOPIC,
      ackTopic: env.ROBOT_ACK_TOPIC,
      stateTopic: env.ROBOT_STATE_TOPIC,
    });

    this.client = connect(env.MQTT_URL ?? "mqtt://localhost:1883", {
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      reconnectPeriod: 2000,
    });

    this.client.on("connect", () => {
      this.logger.info("MQTT connected");
      this.client.subscribe(env.ROBOT_CMD_TOPIC);
      this.publishState().catch((err) => this.logger.error("State publish failed", { message: String(err) }));
    });

    this.client.on("reconnect", () => this.logger.debug("MQTT reconnecting"));
    this.client.on("close", () => this.logger.debug("MQTT close"));
    this.client.on("offline", () => this.logger.warn("MQTT offline"));
    this.client.on("error", (err) => this.logger.error("MQTT error", { message: err.message }));

    this.client.on("message", (topic, payload) => {
      if (topic !== env.ROBOT_CMD_TOPIC) return;
      this.logger.debug("MQTT command received", { payload: payload.toString() });
      this.handleCommand(payload).catch((err) =>
        this.logger.error("MQTT command handling failed", { message: String(err) })
      );
    });
  }

  private async handleCommand(payload: Buffer) {
    const ack = await handleCommandPayload(this.executor, payload.toString());
    this.logger.info("MQTT command done", { id: ack.id, status: ack.status, message: ack.message });
    await this.publish(this.env.ROBOT_ACK_TOPIC, ack);
    await this.publishState();
  }

  publishState(): Promise<void> {
    return this.publish(this.env.ROBOT_STATE_TOPIC, this.executor.snapshot());
  }

  private publish(topic: string, payload: object): Promise<void> {
    const json = JSON.stringify(payload);
    return new Promise<void>((resolve, reject) => {
      this.client.publish(topic, json, (err) => {
        if (err) {
          this.logger.error("MQTT publish error", { message: err.message, topic });
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  async close() {
    this.logger.info("Closing MQTT client");
    await this.client.endAsync();
  }
}

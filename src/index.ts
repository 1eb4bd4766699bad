#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { Command } from "commander";
import inquirer from "inquirer";
import { createLogger } from "./utils/logger";
import { loadEnv } from "./utils/env";
import { createMotionCore, createVoiceServices } from "./core";
import { createHttpApp, startHttpServer, stopHttpServer } from "./http/server";
import { MqttBridge } from "./mqtt/bridge";
import { ConversationLoop, HELP_TEXT } from "./console/loop";

async function serve() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const { link, executor } = createMotionCore(env, logger);
  const voice = createVoiceServices(env, logger);

  // A missing port is not fatal; every motion call then reports not_connected.
  await link.connect();

  const app = createHttpApp({
    executor,
    speech: voice ? voice.speech : null,
    responder: voice ? voice.responder : null,
    logger: logger.child("http"),
    corsOrigins: env.CORS_ORIGINS,
  });
  const server = await startHttpServer(app, env.HTTP_HOST, env.HTTP_PORT, logger);
  const mqtt = env.MQTT_URL ? new MqttBridge(env, logger.child("mqtt"), executor) : null;
  if (!mqtt) logger.info("MQTT bridge disabled (MQTT_URL not set)");

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await stopHttpServer(server);
    if (mqtt) await mqtt.close();
    await link.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error("Shutdown failed", { message: String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

async function chat() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);
  const voice = createVoiceServices(env, logger);
  if (!voice) {
    throw new Error("OPENAI_API_KEY is required for the console conversation");
  }
  const { link, executor } = createMotionCore(env, logger);
  await link.connect();

  // eslint-disable-next-line no-console
  const print = (text: string) => console.log(text);
  const loop = new ConversationLoop({ ...voice, executor, logger, print });
  print(HELP_TEXT);

  for (;;) {
    const { line } = await inquirer.prompt<{ line: string }>([
      { type: "input", name: "line", message: "Your turn:" },
    ]);
    if ((await loop.handleLine(line)) === "exit") break;
  }
  print("Goodbye!");
  await link.close();
}

const program = new Command();
program.name("servo-companion").description("Servo companion host: motion control, HTTP/MQTT commands, voice chat");
program.command("serve", { isDefault: true }).description("run the HTTP and MQTT command surfaces").action(serve);
program.command("chat").description("talk to the companion from the terminal").action(chat);

program.parseAsync(process.argv).catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

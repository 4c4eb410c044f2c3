/**
 * boat-link entry point.
 *
 * Exit codes: 0 after SIGINT/SIGTERM and a clean shutdown, 1 when the
 * configuration is invalid or startup fails. Lost connections are retried
 * forever and never end the process.
 */

import { loadEnv, type Env } from './env'
import { createLogger, type Logger } from './logger'
import { ConfigError, errorMessage } from './errors'
import { createSensorStore, type SensorStore } from './store/sensorStore'
import { asReadonly } from './store/readonly'
import { ControlChannel } from './ws/ControlChannel'
import { DEFAULT_BACKOFF } from './ws/backoff'
import { CommandExecutor } from './device/CommandExecutor'
import { TelemetrySource } from './device/TelemetrySource'
import type { Actuator } from './device/capabilities'
import { MediaSessionManager } from './media/MediaSessionManager'
import { UdpRtpFrameSupplier } from './media/UdpRtpFrameSupplier'
import { WeriftPeerFactory } from './media/weriftPeer'
import { createDeviceClient } from './api/client'
import { iceServerResolver } from './api/ice'
import { SessionOrchestrator } from './session/SessionOrchestrator'
import { SimulatedBoat } from './hardware/SimulatedBoat'
import { PwmMotorController } from './hardware/PwmMotorController'
import { SystemSensorFeed } from './hardware/SystemSensorFeed'
import { GpsSensorFeed } from './hardware/GpsSensorFeed'
import { CompassSensorFeed } from './hardware/CompassSensorFeed'
import type { SensorFeed } from './hardware/SensorFeed'

interface Boat {
  actuator: Actuator
  feeds:    SensorFeed[]
}

async function createBoat(env: Env, store: SensorStore, log: Logger): Promise<Boat> {
  if (env.deviceMode === 'simulated') {
    const sim = new SimulatedBoat({ store, log, tickMs: env.telemetryIntervalMs })
    return { actuator: sim, feeds: [sim] }
  }
  const motors = new PwmMotorController({ log, ...env.pwm })
  await motors.initialize()
  const feeds: SensorFeed[] = [
    new SystemSensorFeed({ store, log }),
    new GpsSensorFeed({ store, log, ...env.gps, courseAsHeading: env.headingSource === 'gps' }),
  ]
  if (env.headingSource === 'compass') feeds.push(new CompassSensorFeed({ store, log, ...env.compass }))
  return { actuator: motors, feeds }
}

async function main(): Promise<number> {
  let env: Env
  try {
    env = loadEnv(process.env)
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    createLogger('error').fatal({ issues: err.issues }, 'invalid configuration')
    return 1
  }

  const log = createLogger(env.logLevel)
  const { deviceId } = env.identity
  log.info({ deviceId, mode: env.deviceMode, node: process.version }, 'starting boat-link')

  const store  = createSensorStore()
  const frames = new UdpRtpFrameSupplier({ port: env.rtpPort, log })
  try {
    await frames.start()
  } catch (err) {
    log.fatal({ err: errorMessage(err), port: env.rtpPort }, 'cannot listen for video')
    return 1
  }
  let boat: Boat
  try {
    boat = await createBoat(env, store, log)
  } catch (err) {
    log.fatal({ err: errorMessage(err) }, 'motor control unavailable')
    await frames.close()
    return 1
  }

  const channel = new ControlChannel(env.identity, {
    log,
    heartbeatMs: env.heartbeatMs,
    backoff:     { ...DEFAULT_BACKOFF, initialMs: env.reconnectInitialMs, maxMs: env.reconnectMaxMs },
  })
  const ice = iceServerResolver(
    env.stunUrls,
    log,
    env.iceConfigUrl ? createDeviceClient({ baseUrl: env.iceConfigUrl, deviceId }) : undefined,
  )
  const media = new MediaSessionManager({
    peers:                new WeriftPeerFactory({ log, iceServers: ice }),
    frames,
    log,
    negotiationTimeoutMs: env.negotiationTimeoutMs,
    epoch:                () => channel.state.getState().epoch,
  })
  const orchestrator = new SessionOrchestrator({
    channel,
    executor:            new CommandExecutor(boat.actuator, log),
    media,
    telemetry:           new TelemetrySource(asReadonly(store), { staleAfterMs: Math.max(3 * env.telemetryIntervalMs, 2000) }),
    telemetryIntervalMs: env.telemetryIntervalMs,
    shutdownGraceMs:     env.shutdownGraceMs,
    log,
  })

  const shutdown = new AbortController()
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      log.info({ signal: sig }, 'shutdown requested')
      shutdown.abort()
    })
  }

  boat.feeds.forEach((feed) => feed.start())
  await orchestrator.run(shutdown.signal)

  boat.feeds.forEach((feed) => feed.stop())
  await boat.actuator.close()
  await frames.close()
  log.info('boat-link stopped')
  return 0
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('boat-link crashed:', err)
    process.exit(1)
  },
)

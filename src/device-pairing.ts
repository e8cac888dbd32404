import type { DeviceTokenStore } from './device-token-store'
import type { DeviceTokenConfig } from './types'
import { PairingError } from './errors'
import { REMARKABLE_CONNECT_URL, type RemarkableClient } from './remarkable-client'

export type PairingState = 'unpaired' | 'pairing' | 'paired'

/** Asks the user for the one-time code shown at `connectUrl`. */
export type PromptForCode = (connectUrl: string) => Promise<string>

/**
 * Pairing lifecycle of this machine with the reMarkable Cloud.
 *
 * unpaired -> pairing -> paired. A rejected code keeps the pairing in the
 * `pairing` state and writes nothing; deleting the token file is the only
 * way back to `unpaired`.
 */
export class DevicePairing {
  protected readonly store: DeviceTokenStore
  protected readonly client: RemarkableClient
  protected _state: PairingState
  protected _config?: DeviceTokenConfig

  constructor({
    config,
    store,
    client
  }: {
    /** Token file contents, as loaded once at startup */
    config?: DeviceTokenConfig
    store: DeviceTokenStore
    client: RemarkableClient
  }) {
    this.store = store
    this.client = client
    this._config = config
    this._state = config ? 'paired' : 'unpaired'
  }

  static async load({
    store,
    client
  }: {
    store: DeviceTokenStore
    client: RemarkableClient
  }): Promise<DevicePairing> {
    const config = await store.load()
    return new DevicePairing({ config, store, client })
  }

  get state(): PairingState {
    return this._state
  }

  get deviceToken(): string | undefined {
    return this._config?.deviceToken
  }

  /** Returns the URL where the user gets a one-time code. */
  beginPairing(): string {
    if (this._state === 'paired') {
      throw new PairingError(
        `Already paired; delete ${this.store.path} to pair again`
      )
    }

    this._state = 'pairing'
    return REMARKABLE_CONNECT_URL
  }

  async completePairing(code: string): Promise<DeviceTokenConfig> {
    if (this._state !== 'pairing') {
      throw new PairingError('Pairing has not been started')
    }

    const { deviceToken, deviceId } = await this.client.registerDevice(code)
    const config: DeviceTokenConfig = {
      deviceToken,
      deviceId,
      pairedAt: new Date().toISOString()
    }

    await this.store.save(config)
    this._config = config
    this._state = 'paired'

    return config
  }

  /**
   * Returns the device token, pairing first if there is none.
   */
  async ensurePaired(promptForCode: PromptForCode): Promise<string> {
    if (this._state === 'paired' && this._config) {
      return this._config.deviceToken
    }

    const connectUrl = this.beginPairing()
    const code = await promptForCode(connectUrl)
    const config = await this.completePairing(code)

    return config.deviceToken
  }
}

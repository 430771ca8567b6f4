/**
 * Commented JSONC configuration template written by `portalkeep config init`
 */
export function generateConfigTemplate(): string {
  return `{
  // Endpoint that answers 204 once the network is open
  "probe": {
    "url": "http://connect.rom.miui.com/generate_204"
  },

  "network": {
    // "proxy": "http://127.0.0.1:8080",
    "requestTimeout": 10000,
    "logoutTimeout": 5000
  },

  // Used until the portal advertises its own interval (seconds)
  "heartbeat": {
    "defaultInterval": 60
  },

  // One session per account; give each its own interface when running several
  "accounts": [
    {
      "username": "\${PORTAL_USERNAME}",
      "password": "\${PORTAL_PASSWORD}",
      // "bindInterface": "eth0",
      "checkInterval": 10000,
      "retryInterval": 10000
    }
  ],

  // Key material for portal algorithm ids, hex encoded
  "ciphers": {
    // "A1B2C3D4-0000-0000-0000-000000000000": { "type": "aes-256-gcm", "key": "..." }
  },

  "logging": {
    "level": "info",
    "format": "compact"
  }
}
`
}

/**
 * modelhost Wire Protocol: Version
 *
 * Bump PROTOCOL_VERSION when:
 * - WebSocket message structure changes (fields added/removed/renamed)
 * - New required fields in handshake
 * - Error body or descriptor shape changes incompatibly
 *
 * Do NOT bump for:
 * - New optional fields (additive, backwards-compatible)
 * - New commands registered by a model (they are discovered at runtime)
 * - Server-internal changes
 */

export const PROTOCOL_VERSION = 1;

export const GATEWAY_REACTOR = Symbol('GATEWAY_REACTOR')
export const GATEWAY_LOGGER = Symbol('GATEWAY_LOGGER')
export const GATEWAY_MAX_BODY_BYTES = Symbol('GATEWAY_MAX_BODY_BYTES')
export const GATEWAY_REQUEST_HANDLER = Symbol('GATEWAY_REQUEST_HANDLER')

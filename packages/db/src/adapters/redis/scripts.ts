/**
 * Lua scripts, one per command. Each runs atomically on the server.
 *
 * KEYS[1] document key, KEYS[2] version key, KEYS[3] version sequence.
 * Replies are arrays whose first element is a status string.
 */

export const GET_SCRIPT = `
local content = redis.call('GET', KEYS[1])
if not content then
  return nil
end
local version = redis.call('GET', KEYS[2]) or '0'
return { 'ok', content, version }
`

export const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return { 'already_exists' }
end
local version = tostring(redis.call('INCR', KEYS[3]))
redis.call('SET', KEYS[1], ARGV[1])
redis.call('SET', KEYS[2], version)
return { 'ok', version }
`

export const UPDATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return { 'not_found' }
end
local current = redis.call('GET', KEYS[2]) or '0'
if ARGV[2] ~= '0' and current ~= ARGV[2] then
  return { 'version_conflict', current }
end
local version = tostring(redis.call('INCR', KEYS[3]))
redis.call('SET', KEYS[1], ARGV[1])
redis.call('SET', KEYS[2], version)
return { 'ok', version }
`

export const REMOVE_SCRIPT = `
if redis.call('DEL', KEYS[1]) == 0 then
  return { 'not_found' }
end
redis.call('DEL', KEYS[2])
return { 'ok' }
`

export const GET_COUNTER_SCRIPT = `
local content = redis.call('GET', KEYS[1])
if not content then
  return nil
end
return { 'ok', content }
`

export const INCREMENT_COUNTER_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local value = tonumber(ARGV[1])
if current then
  if not string.match(current, '^%-?%d+$') then
    return { 'decode_error', current }
  end
  value = tonumber(current) + value
end
if value > 9007199254740991 or value < -9007199254740991 then
  return { 'decode_error', current or '' }
end
local text = string.format('%d', value)
redis.call('SET', KEYS[1], text)
redis.call('SET', KEYS[2], tostring(redis.call('INCR', KEYS[3])))
return { 'ok', text }
`

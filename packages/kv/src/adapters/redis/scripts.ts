/**
 * Lua scripts for the versioned store. Each value key `k` has a counter at
 * `k:v`; a missing counter reads as version "0". A ttl argument of '' keeps
 * the value key's current expiry and mirrors it onto the counter.
 */

export const GET_VERSIONED = `
  local value = redis.call('GET', KEYS[1])
  if not value then
    return nil
  end

  local version = redis.call('GET', KEYS[2])
  if not version then
    version = '0'
  end

  return { value, version }
`

const WRITE_AND_BUMP = `
  local function write_and_bump(value, ttl)
    if ttl ~= '' then
      local ms = tonumber(ttl)
      redis.call('SET', KEYS[1], value, 'PX', ms)
      local v = redis.call('INCR', KEYS[2])
      redis.call('PEXPIRE', KEYS[2], ms)
      return v
    end

    redis.call('SET', KEYS[1], value, 'KEEPTTL')
    local v = redis.call('INCR', KEYS[2])
    local pttl = redis.call('PTTL', KEYS[1])
    if pttl > 0 then
      redis.call('PEXPIRE', KEYS[2], pttl)
    else
      redis.call('PERSIST', KEYS[2])
    end
    return v
  end
`

// ARGV[1] = value, ARGV[2] = ttl ms or ''
export const SET_WITH_VERSION = `
  ${WRITE_AND_BUMP}
  return tostring(write_and_bump(ARGV[1], ARGV[2]))
`

// ARGV[1] = expected version, ARGV[2] = value, ARGV[3] = ttl ms or ''
export const SET_IF_VERSION = `
  ${WRITE_AND_BUMP}
  if not redis.call('GET', KEYS[1]) then
    return 'not_found'
  end

  local current = redis.call('GET', KEYS[2])
  if not current then
    current = '0'
  end

  if current ~= ARGV[1] then
    return 'conflict'
  end

  return tostring(write_and_bump(ARGV[2], ARGV[3]))
`

// ARGV[1] = value, ARGV[2] = ttl ms or ''
export const SET_IF_NOT_EXISTS = `
  ${WRITE_AND_BUMP}
  if redis.call('EXISTS', KEYS[1]) == 1 then
    return 'skipped'
  end

  redis.call('DEL', KEYS[2])
  write_and_bump(ARGV[1], ARGV[2])
  return 'written'
`

/**
 * Lua scripts that make multi-step checks atomic on the server.
 */

/**
 * Returns the value and deletes the key in one step.
 *
 * KEYS[1]: key to pop
 */
export const POP_ONCE = `
local value = redis.call('GET', KEYS[1])
if value then
  redis.call('DEL', KEYS[1])
end
return value
`;

/**
 * Adds a member above every existing one.
 *
 * KEYS[1]: ordered set
 * ARGV[1]: member
 * ARGV[2]: minimum score
 *
 * Returns the assigned score as a string (Lua numbers reply as integers).
 */
export const APPEND_TO_SET = `
local score = tonumber(ARGV[2])
local top = redis.call('ZRANGE', KEYS[1], -1, -1, 'WITHSCORES')
if top[2] and tonumber(top[2]) + 1 > score then
  score = tonumber(top[2]) + 1
end
redis.call('ZADD', KEYS[1], score, ARGV[1])
return tostring(score)
`;

/**
 * Removes a member from an ordered set only while the guard key is absent.
 *
 * KEYS[1]: ordered set
 * KEYS[2]: guard key (the session record)
 * ARGV[1]: member
 *
 * Returns the number of members removed (0 or 1).
 */
export const REMOVE_IF_ABSENT = `
if redis.call('EXISTS', KEYS[2]) == 1 then
  return 0
end
return redis.call('ZREM', KEYS[1], ARGV[1])
`;

/**
 * Deletes an ordered set that has no members left.
 *
 * KEYS[1]: ordered set
 *
 * Returns 1 when the key no longer exists, 0 when it still has members.
 */
export const DELETE_IF_EMPTY = `
if redis.call('ZCARD', KEYS[1]) == 0 then
  redis.call('DEL', KEYS[1])
  return 1
end
return 0
`;

/**
 * Deletes a lock key only if it still holds the caller's token.
 *
 * KEYS[1]: lock key
 * ARGV[1]: token
 */
export const RELEASE_LOCK = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

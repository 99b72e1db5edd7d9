import type { InlineKeyboard } from "./types"

export const ADMIN_ACTIONS = {
  stats: "admin_stats",
  users: "admin_users",
  settings: "admin_settings",
  system: "admin_system",
  back: "admin_back",
  close: "admin_close",
} as const

export type AdminAction = (typeof ADMIN_ACTIONS)[keyof typeof ADMIN_ACTIONS]

export const ADMIN_PANEL_TEXT =
  "🔧 Admin Control Panel\n\nSelect an option to manage the bot:"

export const ADMIN_PANEL_KEYBOARD: InlineKeyboard = [
  [
    { text: "📊 Detailed Stats", data: ADMIN_ACTIONS.stats },
    { text: "👥 User Info", data: ADMIN_ACTIONS.users },
  ],
  [
    { text: "⚙️ Bot Settings", data: ADMIN_ACTIONS.settings },
    { text: "📋 System Info", data: ADMIN_ACTIONS.system },
  ],
  [{ text: "❌ Close", data: ADMIN_ACTIONS.close }],
]

export const BACK_KEYBOARD: InlineKeyboard = [
  [{ text: "🔙 Back to Admin Panel", data: ADMIN_ACTIONS.back }],
]

const ADMIN_ACTION_VALUES: ReadonlyArray<string> = Object.values(ADMIN_ACTIONS)

export const isAdminAction = (data: string): data is AdminAction =>
  ADMIN_ACTION_VALUES.includes(data)

/**
 * Capability check for admin-only commands. It runs in the processing loop
 * before any admin view is built; shared state knows nothing about roles.
 */
export const isAdmin = (identity: string, adminId: string): boolean =>
  adminId !== "" && identity === adminId

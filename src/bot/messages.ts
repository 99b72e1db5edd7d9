import type { AppConfig } from "~/lib/config"
import type { ConversationSize, StatusSnapshot } from "~/lib/runtime-state"

import { formatMegabytes, percentage } from "~/lib/format"

export const RATE_LIMITED_TEXT =
  "⚠️ You're sending requests too quickly. Please wait a moment."
export const ACCESS_DENIED_TEXT = "❌ Access denied. Admin only."
export const CONTEXT_CLEARED_TEXT =
  "🗑️ Conversation context cleared! Starting fresh."
export const GENERIC_FAILURE_TEXT =
  "❌ Sorry, I couldn't complete that request. Please try again later."
export const GENERATE_USAGE_TEXT =
  "Please provide a prompt for image generation.\n"
  + "Example: /generate a beautiful sunset over mountains"
export const GENERATING_TEXT = "🎨 Generating your image, please wait..."
export const ANALYZING_TEXT = "🔍 Analyzing your image, please wait..."
export const ADMIN_PANEL_CLOSED_TEXT = "🔧 Admin panel closed."

export const welcomeText = (name: string, isAdmin: boolean): string => {
  const lines = [
    `🤖 Welcome to Advanced Gemini AI Bot, ${name}!`,
    "",
    "🌟 Features:",
    "• 💬 Chat with Gemini AI",
    "• 🖼️ Generate images with /generate",
    "• 🔍 Analyze images (just send a photo)",
    "• 📊 Get bot status with /status",
    "",
    "Simply send me a message to start chatting!",
  ]
  if (isAdmin) {
    lines.push(
      "",
      "🔧 Admin Commands:",
      "• /admin - Admin panel",
      "• /stats - Detailed statistics",
    )
  }
  return lines.join("\n")
}

export const helpText = (config: AppConfig): string =>
  [
    "🤖 Bot Commands:",
    "",
    "🔹 /start - Welcome message",
    "🔹 /help - This help message",
    "🔹 /generate <prompt> - Generate an image",
    "🔹 /status - Bot status information",
    "🔹 /clear - Clear conversation context",
    "",
    "💬 Chat Features:",
    "• Send any text message to chat with Gemini AI",
    "• Send photos for detailed image analysis",
    `• The last ${config.contextMaxTurns} turns are kept as context`,
    "",
    "📸 Image Analysis:",
    "• Supports JPEG, PNG, and WebP formats",
    `• Max file size: ${formatMegabytes(config.maxImageSize)}`,
    "",
    "🎨 Image Generation:",
    "• Example: /generate a sunset over mountains",
  ].join("\n")

export const imageTooLargeText = (maxBytes: number): string =>
  `❌ Image is too large. Maximum size is ${formatMegabytes(maxBytes)}.`

export const statusText = (snapshot: StatusSnapshot): string =>
  [
    "🤖 Bot Status",
    "",
    "✅ Status: Online",
    `⏰ Uptime: ${snapshot.uptime_formatted}`,
    `📊 Messages: ${snapshot.messages_processed}`,
    `🖼️ Images Analyzed: ${snapshot.images_analyzed}`,
    `🎨 Images Generated: ${snapshot.images_generated}`,
    `❌ Errors: ${snapshot.errors}`,
    `🚀 Started: ${snapshot.started_at}`,
  ].join("\n")

export const detailedStatsText = (snapshot: StatusSnapshot): string => {
  const avgPerUser =
    snapshot.messages_processed / Math.max(snapshot.active_users, 1)

  return [
    "📊 Detailed Bot Statistics",
    "",
    `⏰ Uptime: ${snapshot.uptime_formatted}`,
    `🚀 Started: ${snapshot.started_at}`,
    "",
    "📈 Usage Statistics:",
    `• Messages Processed: ${snapshot.messages_processed}`,
    `• Images Analyzed: ${snapshot.images_analyzed}`,
    `• Images Generated: ${snapshot.images_generated}`,
    `• Total Errors: ${snapshot.errors}`,
    "",
    "👥 User Statistics:",
    `• Active Users: ${snapshot.active_users}`,
    `• Stored Turns: ${snapshot.context_size_total}`,
    "",
    "💾 Performance:",
    `• Error Rate: ${percentage(snapshot.errors, snapshot.messages_processed).toFixed(2)}%`,
    `• Avg Messages/User: ${avgPerUser.toFixed(1)}`,
  ].join("\n")
}

export const userInfoText = (
  activeUsers: number,
  sizes: Array<ConversationSize>,
): string => {
  if (sizes.length === 0) {
    return "👥 User Information\n\nNo active users found."
  }

  const rows = sizes.map(
    (entry, index) =>
      `${index + 1}. User ID: ${entry.identity} - ${entry.turns} messages`,
  )
  return [
    "👥 User Information",
    "",
    `Active Users: ${activeUsers}`,
    "",
    ...rows,
  ].join("\n")
}

export const settingsText = (config: AppConfig): string =>
  [
    "⚙️ Bot Settings",
    "",
    "🔧 Current Configuration:",
    `• Max Message Length: ${config.maxMessageLength} chars`,
    `• Max Image Size: ${formatMegabytes(config.maxImageSize)}`,
    `• Rate Limit: ${config.rateLimitMessages} msgs / ${config.rateLimitWindowSeconds}s`,
    `• Context Length: ${config.contextMaxTurns} turns`,
    `• Backend Timeout: ${config.backendTimeoutMs / 1000}s`,
    "",
    "📝 Settings are configured via environment variables.",
  ].join("\n")

export const systemInfoText = (): string => {
  const memory = process.memoryUsage()
  return [
    "📋 System Information",
    "",
    "🖥️ System:",
    `• Platform: ${process.platform} (${process.arch})`,
    `• Node.js: ${process.version}`,
    `• PID: ${process.pid}`,
    "",
    "⚡ Performance:",
    `• RSS: ${formatMegabytes(memory.rss)}`,
    `• Heap: ${formatMegabytes(memory.heapUsed)} / ${formatMegabytes(memory.heapTotal)}`,
    `• Process uptime: ${Math.floor(process.uptime())}s`,
  ].join("\n")
}

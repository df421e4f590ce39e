// ============================================================================
// Outbound chat texts
// ============================================================================

export const LINK_INSTRUCTIONS =
  '👋 Welcome to EchoMind!\n\n' +
  'To connect your account, you need to provide your verification code.\n\n' +
  'Please send a message in this format:\n' +
  '/start YOUR_CODE\n\n' +
  'You can find your verification code on the welcome page of the EchoMind portal.';

export const INVALID_CODE =
  '❌ Sorry, the verification code is invalid or has expired. ' +
  'Please try again or generate a new code from the EchoMind portal.';

export const INVALID_TIME =
  "❌ That doesn't look like a valid time. Please use the 24-hour HH:MM format (e.g. '19:30').";

export const HELP_REQUEST_SENT =
  'Your request has been sent to healthcare professionals. Someone will contact you soon.';

export const HELP_REQUEST_FAILED =
  'Sorry, there was an error processing your request. Please try again later.';

export const PROVIDER_FREE_TEXT =
  "I received your message. As a healthcare provider, you'll receive notifications here when patients need attention.";

export function patientLinked(name: string, preferredTime: string | null): string {
  if (preferredTime) {
    return (
      "✅ You've been successfully connected to EchoMind!\n\n" +
      `Welcome, ${name}. Your daily check-in time has been set to ${preferredTime}.\n\n` +
      "I'll remind you each day around this time. You can change this anytime by telling me a new time (e.g. '19:30')."
    );
  }

  return (
    "✅ You've been successfully connected to EchoMind!\n\n" +
    `Welcome, ${name}. Your healthcare provider can now see your check-ins and sentiment scores.\n\n` +
    'To help with your daily check-ins, when would you prefer to receive check-in reminders? ' +
    "Please reply with a time in 24-hour format (e.g., '19:30' for 7:30 PM)."
  );
}

export function providerLinked(name: string): string {
  const lastName = name.trim().split(/\s+/).pop() || name;
  return (
    `✅ Welcome to EchoMind, Dr. ${lastName}!\n\n` +
    'This bot will be used to alert you when patients indicate they need to speak with a medical professional.\n\n' +
    "You'll receive notifications here when urgent patient matters require your attention."
  );
}

export function checkinTimeUpdated(time: string): string {
  return (
    `✅ Great! Your daily check-in time has been set to ${time}.\n\n` +
    "I'll remind you each day around this time. You can change this anytime by telling me a new time."
  );
}

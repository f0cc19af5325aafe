/**
 * One-time helper that exchanges an OAuth consent code for a Gmail refresh
 * token. Run: npm run auth
 *
 * Needs GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET (Desktop app OAuth client
 * with the Gmail API enabled) in .env. Paste the printed token into .env as
 * GMAIL_REFRESH_TOKEN.
 */

import { google } from "googleapis";
import * as readline from "readline";
import { DEFAULT_REDIRECT_URI, loadDotenv } from "./utils/config";
import { logger } from "./utils/logger";

// The pipeline only reads mail.
const SCOPES = ["https://www.googleapis.com/auth/gmail.readonly"];

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function main() {
  loadDotenv();
  const clientId = process.env.GMAIL_CLIENT_ID;
  const clientSecret = process.env.GMAIL_CLIENT_SECRET;
  if (!clientId || !clientSecret) {
    throw new Error("Set GMAIL_CLIENT_ID and GMAIL_CLIENT_SECRET in .env first");
  }

  const oauth2Client = new google.auth.OAuth2(
    clientId,
    clientSecret,
    process.env.GMAIL_REDIRECT_URI || DEFAULT_REDIRECT_URI
  );

  const authUrl = oauth2Client.generateAuthUrl({
    access_type: "offline",
    scope: SCOPES,
    prompt: "consent",
  });

  console.log("\n1. Open this URL in your browser:\n");
  console.log(authUrl);
  console.log("\n2. Authorize the app and copy the ?code= parameter from the redirect URL\n");

  const code = await ask("3. Paste the code here: ");
  const { tokens } = await oauth2Client.getToken(decodeURIComponent(code));
  if (!tokens.refresh_token) {
    throw new Error("No refresh token returned; revoke the app's access and retry");
  }

  console.log("\nAdd this to your .env file:\n");
  console.log(`GMAIL_REFRESH_TOKEN=${tokens.refresh_token}`);
}

main().catch((error) => {
  logger.error("Failed to get token", error);
  process.exit(1);
});

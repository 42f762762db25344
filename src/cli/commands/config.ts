/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize migration settings.");
  console.log("See src/config/default.json for available options.");
  console.log(
    "UPLOAD_URL, API_KEY, DB_SERVER, DB_DATABASE, DB_USERNAME, DB_PASSWORD and IMAGE_DOWNLOAD_PATH",
  );
  console.log("are read from the environment or a .env file.");
}

import type { AppConfig } from "../../config";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
import { AzureTTS } from "./azure";

export type { ITTS, VoiceOptions } from "./types";
export { pickVoice } from "./types";
export { StubTTS } from "./stub";
export { GoogleCloudTTS, GoogleCloudTTSADC } from "./google-cloud";
export { AzureTTS, azureOutputFormat } from "./azure";

/**
 * Synthesis provider for the configured backend. Google uses the REST API with a key, otherwise
 * Application Default Credentials; Azure needs key and region. The default language seeds voice
 * selection for calls that pass none.
 */
export function createTTS(config: AppConfig): ITTS {
  const { provider, googleApiKey, googleVoiceName, azureKey, azureRegion, azureVoiceName } = config.tts;
  const languageCode = config.conversation.defaultLanguage;
  switch (provider) {
    case "google":
      return googleApiKey
        ? new GoogleCloudTTS({ apiKey: googleApiKey, voiceName: googleVoiceName, languageCode })
        : new GoogleCloudTTSADC({ voiceName: googleVoiceName, languageCode });
    case "azure":
      if (azureKey && azureRegion) {
        return new AzureTTS({ key: azureKey, region: azureRegion, voiceName: azureVoiceName, languageCode });
      }
      break;
  }
  return new StubTTS();
}

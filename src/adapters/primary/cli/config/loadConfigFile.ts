import { FileSystemPort } from "../../../../application/ports/driven/FileSystemPort";
import { ConfigError, errorMessage } from "../../../../shared/errors";
import { decodeUtf8 } from "../../../../shared/utils/textDecoding";
import { RepoDigestConfig, RepoDigestConfigSchema } from "./ConfigSchema";

/**
 * Lee y valida el archivo de configuración.
 * @throws ConfigError si no existe, no es JSON o no cumple el esquema
 */
export async function loadConfigFile(
  fsPort: FileSystemPort,
  configPath: string
): Promise<RepoDigestConfig> {
  let raw: unknown;
  try {
    const bytes = await fsPort.readBytes(configPath);
    raw = JSON.parse(decodeUtf8(bytes, configPath));
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const parsed = RepoDigestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

import axios from "axios";

// Short reason string for an axios failure, safe to log and store
export const describeHttpError = (err: unknown): string => {
  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED") return "timeout";
    if (err.response) return `HTTP ${err.response.status}`;
    return err.code || err.message;
  }
  return err instanceof Error ? err.message : String(err);
};

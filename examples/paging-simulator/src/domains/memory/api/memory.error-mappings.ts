import type { ErrorMapping } from "@pagesim/server"

export const memoryErrorMappings = {
  validation_error: { status: 422 },
  process_not_found: { status: 404 },
  invalid_page: { status: 422 },
  no_processes: { status: 409 },
  simulator_busy: { status: 503, message: "Simulator is busy, try again" },
  no_frames_available: { status: 500, message: "No frame could be allocated" },
} satisfies Record<string, ErrorMapping>

import { describeDocumentBackendContract } from "../../../../ports/__tests__/document-backend.contract"
import { MemoryDocumentBackend } from "../../memory-document-backend"

describeDocumentBackendContract("MemoryDocumentBackend", () => {
  return new MemoryDocumentBackend({ maxEntries: 1000 })
})

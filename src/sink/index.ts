export * from "./noFileAttachmentSink";

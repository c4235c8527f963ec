export {
  ProfileTextExtractor,
  detectUploadFormat,
  readPdfText,
  type ProfileUpload,
  type PdfTextReader,
} from './profile-text-extractor';

import {
  Typography,
  Button,
  Image,
  Space,
  Spin,
  Alert,
  Tooltip,
  message,
} from 'antd';
import { DownloadOutlined, CloudDownloadOutlined } from '@ant-design/icons';
import type { GenerationResult } from '@/types';
import { downloadImage, downloadImagesAsZip, imageFilename } from '@/utils/download';
import styles from './ResultGallery.module.css';

const { Title } = Typography;

interface ResultGalleryProps {
  result: GenerationResult | null;
  loading: boolean;
  error: string | null;
  /** Download file name prefix */
  prefix: string;
  title?: string;
  onDismissError?: () => void;
}

/**
 * Output of one call: spinner, error, the empty-result message, or the images
 */
export function ResultGallery({
  result,
  loading,
  error,
  prefix,
  title = 'Generated Images',
  onDismissError,
}: ResultGalleryProps) {
  const images = result?.images ?? [];

  const handleDownloadAll = async () => {
    try {
      await downloadImagesAsZip(images, prefix);
    } catch (e) {
      console.error('[Download]', e);
      message.error('Download failed');
    }
  };

  if (loading) {
    return (
      <div className={styles.loading}>
        <Spin size="large" tip="Waiting for the model...">
          <div className={styles.spinArea} />
        </Spin>
      </div>
    );
  }

  if (error) {
    return (
      <Alert
        type="error"
        showIcon
        message="Request failed"
        description={error}
        closable={Boolean(onDismissError)}
        onClose={onDismissError}
        className={styles.alert}
      />
    );
  }

  if (!result) return null;

  return (
    <div className={styles.container}>
      {result.failureReason && (
        <Alert
          type="warning"
          showIcon
          message={images.length === 0 ? 'No image produced' : 'The model reported a problem'}
          description={result.failureReason}
          className={styles.alert}
        />
      )}

      {images.length > 0 && (
        <>
          <div className={styles.header}>
            <Title level={5} className={styles.title}>
              {title} <span className={styles.count}>({images.length})</span>
            </Title>
            {images.length > 1 && (
              <Tooltip title="Download all as ZIP">
                <Button type="text" size="small" icon={<CloudDownloadOutlined />} onClick={handleDownloadAll} />
              </Tooltip>
            )}
          </div>

          <Image.PreviewGroup>
            <div className={styles.grid}>
              {images.map((image, index) => (
                <div key={image.id} className={styles.imageCard}>
                  <Image src={image.dataUrl} alt={`${title} ${index + 1}`} className={styles.image} />
                  <Space className={styles.downloadOverlay}>
                    <Button
                      type="text"
                      size="small"
                      icon={<DownloadOutlined />}
                      onClick={(e) => {
                        e.stopPropagation();
                        downloadImage(image, imageFilename(image, prefix, index));
                      }}
                    />
                  </Space>
                </div>
              ))}
            </div>
          </Image.PreviewGroup>
        </>
      )}
    </div>
  );
}

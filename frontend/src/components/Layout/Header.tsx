import { Layout, Menu, Tag, Typography, Space } from 'antd';
import { PictureOutlined } from '@ant-design/icons';
import { useNavigate, useLocation } from 'react-router-dom';
import { getConfig } from '@/config';
import { TOOL_PAGES, WELCOME_PAGE } from '@/pages/registry';
import styles from './Layout.module.css';

const { Title } = Typography;

/**
 * Top navigation bar
 */
export function Header() {
  const navigate = useNavigate();
  const location = useLocation();
  const { modelId } = getConfig();

  const menuItems = [WELCOME_PAGE, ...TOOL_PAGES].map((page) => ({
    key: page.path,
    icon: page.icon,
    label: page.title,
  }));

  return (
    <Layout.Header className={styles.header}>
      <div className={styles.headerLeft}>
        <Space align="center" size={12}>
          <PictureOutlined className={styles.logo} />
          <Title level={4} className={styles.title}>
            Image Tools
          </Title>
        </Space>
      </div>

      <Menu
        mode="horizontal"
        selectedKeys={[location.pathname]}
        items={menuItems}
        onClick={({ key }) => navigate(key)}
        className={styles.nav}
      />

      <div className={styles.headerRight}>
        <Tag color="blue">{modelId}</Tag>
      </div>
    </Layout.Header>
  );
}

import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';

export default function Footer() {
  return (
    <footer className="site-footer">
      <p className="footer-meta">
        Engine v{ENGINE_VERSION} &nbsp;·&nbsp; Output contract {CONTRACT_VERSION}
      </p>
    </footer>
  );
}
